import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { DatabaseModule } from '../database.module';
import { JwtStrategy } from './strategies/jwt.strategy';

// Tokens are issued elsewhere; this module only verifies them.
@Module({
  imports: [PassportModule.register({ defaultStrategy: 'jwt' }), DatabaseModule],
  providers: [JwtStrategy],
  exports: [PassportModule, JwtStrategy],
})
export class AuthModule {}
