import { Global, Module } from '@nestjs/common';
import { operationsPolicyProvider, OPERATIONS_POLICY } from './operations-policy';

@Global()
@Module({
  providers: [operationsPolicyProvider],
  exports: [OPERATIONS_POLICY],
})
export class PolicyModule {}
