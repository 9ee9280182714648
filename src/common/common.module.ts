import { Global, Module } from '@nestjs/common';
import { LEDGER_CONFIG, loadLedgerConfig } from './config/ledger.config';

/**
 * CommonModule
 *
 * 전역 모듈로 선언하여 모든 모듈에서 자동으로 사용 가능
 *
 * 포함된 Provider:
 * - LEDGER_CONFIG: 환경 변수에서 읽은 LedgerConfig (시작 시 한 번만 검증)
 */
@Global()
@Module({
  providers: [
    {
      provide: LEDGER_CONFIG,
      useFactory: () => loadLedgerConfig(),
    },
  ],
  exports: [LEDGER_CONFIG],
})
export class CommonModule {}
