import { Module } from '@nestjs/common';
import { LEDGER_CONFIG, LedgerConfig } from '../common/config/ledger.config';
import { LedgerEventLog, LedgerEventSink } from './events/ledger-event-log';
import { LedgerController } from './ledger.controller';
import { LedgerService } from './ledger.service';

/**
 * Ledger Module
 *
 * 원장 작업 + HTTP API + 이벤트 로그
 *
 * LedgerEventSink는 LedgerEventLog와 같은 인스턴스
 * (서비스는 싱크로 기록하고 컨트롤러는 로그로 조회)
 */
@Module({
  controllers: [LedgerController],
  providers: [
    LedgerService,
    {
      provide: LedgerEventLog,
      useFactory: (config: LedgerConfig) =>
        new LedgerEventLog(config.eventLogLimit),
      inject: [LEDGER_CONFIG],
    },
    {
      provide: LedgerEventSink,
      useExisting: LedgerEventLog,
    },
  ],
  exports: [LedgerService, LedgerEventLog],
})
export class LedgerModule {}
