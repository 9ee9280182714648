import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { CommonModule } from './common/common.module';
import { LedgerExceptionFilter } from './common/filters/ledger-exception.filter';
import { LedgerModule } from './ledger/ledger.module';
import { StateModule } from './state/state.module';
import { StorageModule } from './storage/storage.module';

/**
 * AppModule
 *
 * 애플리케이션의 루트 모듈
 *
 * Global Modules:
 * - CommonModule: 설정 (LEDGER_CONFIG)
 * - StorageModule: 원장 저장소 (memory / leveldb)
 * - StateModule: 저널링 상태 관리 (LedgerStateManager)
 *
 * Feature Modules:
 * - LedgerModule: 원장 작업, HTTP API, 이벤트 로그
 */
@Module({
  imports: [
    // Global Modules
    CommonModule,
    StorageModule,
    StateModule,

    // Feature Modules
    LedgerModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: LedgerExceptionFilter,
    },
  ],
})
export class AppModule {}
