import { Global, Module } from '@nestjs/common';
import { LedgerStateManager } from './ledger-state-manager';

/**
 * StateModule
 *
 * 전역 모듈로 선언하여 모든 모듈에서 LedgerStateManager 자동 사용 가능
 *
 * 의존성:
 * - ILedgerRepository: StorageModule에서 글로벌로 제공
 */
@Global()
@Module({
  providers: [LedgerStateManager],
  exports: [LedgerStateManager],
})
export class StateModule {}
