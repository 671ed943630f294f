import { ConfigService } from '@nestjs/config';

export const OPERATIONS_POLICY = Symbol('operations-policy');

export interface OperationsPolicy {
  longHaulThresholdMinutes: number;
  /** Customers may cancel only while departure is more than this many hours away. */
  customerCancelMinHours: number;
  /** Active orders become Completed once departure is this close. */
  orderCompletionHours: number;
  managerCancelMinHours: number;
  cancellationFeePercent: number;
}

export const DEFAULT_OPERATIONS_POLICY: OperationsPolicy = {
  longHaulThresholdMinutes: 360,
  customerCancelMinHours: 36,
  orderCompletionHours: 36,
  managerCancelMinHours: 72,
  cancellationFeePercent: 5,
};

export const operationsPolicyProvider = {
  provide: OPERATIONS_POLICY,
  inject: [ConfigService],
  useFactory: (config: ConfigService): OperationsPolicy => ({
    ...DEFAULT_OPERATIONS_POLICY,
    longHaulThresholdMinutes: config.get<number>(
      'LONG_HAUL_THRESHOLD_MINUTES',
      DEFAULT_OPERATIONS_POLICY.longHaulThresholdMinutes,
    ),
  }),
};
