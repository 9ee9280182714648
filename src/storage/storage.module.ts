import { Global, Module } from '@nestjs/common';
import { LEDGER_CONFIG, LedgerConfig } from '../common/config/ledger.config';
import { LedgerLevelDBRepository } from './repositories/ledger-leveldb.repository';
import { LedgerMemoryRepository } from './repositories/ledger-memory.repository';
import { ILedgerRepository } from './repositories/ledger.repository.interface';

/**
 * Storage Module (Global)
 *
 * 인프라 계층 - 원장 저장소 선택
 *
 * LEDGER_STORAGE:
 * - memory: 프로세스 메모리 (재시작 시 Genesis부터 다시 시작)
 * - leveldb: LEDGER_DB_PATH 디렉토리에 영속 저장
 *
 * Export:
 * - ILedgerRepository: 원장 상태 저장소
 */
@Global()
@Module({
  providers: [
    {
      provide: ILedgerRepository,
      useFactory: (config: LedgerConfig): ILedgerRepository =>
        config.storage === 'leveldb'
          ? new LedgerLevelDBRepository(config.dbPath)
          : new LedgerMemoryRepository(),
      inject: [LEDGER_CONFIG],
    },
  ],
  exports: [ILedgerRepository],
})
export class StorageModule {}
