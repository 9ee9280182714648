import {
  DEFAULT_ADMIN_ADDRESS,
  DEFAULT_DB_PATH,
  DEFAULT_EVENT_LOG_LIMIT,
  DEFAULT_INITIAL_SUPPLY,
  DEFAULT_TOKEN_DECIMALS,
  DEFAULT_TOKEN_NAME,
  DEFAULT_TOKEN_SYMBOL,
  UINT256_MAX,
  ZERO_ADDRESS,
} from '../constants/ledger.constants';
import { Address, Amount, isValidAddress } from '../types/common.types';

/**
 * 저장소 종류
 *
 * - memory: Map 기반 (재시작 시 소실, 테스트/개발용)
 * - leveldb: classic-level 기반 영구 저장
 */
export type LedgerStorageKind = 'memory' | 'leveldb';

/**
 * 원장 설정
 *
 * 애플리케이션 시작 시 한 번 환경변수에서 읽어서 고정됨
 */
export interface LedgerConfig {
  port: number;
  admin: Address;
  initialSupply: Amount;
  name: string;
  symbol: string;
  decimals: number;
  storage: LedgerStorageKind;
  dbPath: string;
  eventLogLimit: number;
}

/**
 * DI 토큰
 */
export const LEDGER_CONFIG = 'LEDGER_CONFIG';

/**
 * 환경변수 → LedgerConfig
 *
 * | 변수                     | 기본값         |
 * |--------------------------|----------------|
 * | PORT                     | 3000           |
 * | LEDGER_ADMIN             | 0x1111...1111  |
 * | LEDGER_INITIAL_SUPPLY    | 1000000        |
 * | LEDGER_NAME              | Mini Dollar    |
 * | LEDGER_SYMBOL            | mUSD           |
 * | LEDGER_DECIMALS          | 6              |
 * | LEDGER_STORAGE           | memory         |
 * | LEDGER_DB_PATH           | data/ledger    |
 * | LEDGER_EVENT_LOG_LIMIT   | 10000          |
 *
 * @throws {Error} 값 형식이 잘못된 경우 (시작 자체를 막음)
 */
export function loadLedgerConfig(
  env: NodeJS.ProcessEnv = process.env,
): LedgerConfig {
  const admin = env.LEDGER_ADMIN ?? DEFAULT_ADMIN_ADDRESS;
  if (!isValidAddress(admin) || admin.toLowerCase() === ZERO_ADDRESS) {
    throw new Error(`LEDGER_ADMIN must be a non-zero address: ${admin}`);
  }

  const supplyRaw = env.LEDGER_INITIAL_SUPPLY ?? DEFAULT_INITIAL_SUPPLY.toString();
  if (!/^\d+$/.test(supplyRaw) || BigInt(supplyRaw) > UINT256_MAX) {
    throw new Error(
      `LEDGER_INITIAL_SUPPLY must be an unsigned 256-bit integer: ${supplyRaw}`,
    );
  }

  const storage = env.LEDGER_STORAGE ?? 'memory';
  if (storage !== 'memory' && storage !== 'leveldb') {
    throw new Error(`LEDGER_STORAGE must be "memory" or "leveldb": ${storage}`);
  }

  return {
    port: parseInteger('PORT', env.PORT, 3000),
    admin: admin.toLowerCase(),
    initialSupply: BigInt(supplyRaw),
    name: env.LEDGER_NAME ?? DEFAULT_TOKEN_NAME,
    symbol: env.LEDGER_SYMBOL ?? DEFAULT_TOKEN_SYMBOL,
    decimals: parseInteger(
      'LEDGER_DECIMALS',
      env.LEDGER_DECIMALS,
      DEFAULT_TOKEN_DECIMALS,
    ),
    storage,
    dbPath: env.LEDGER_DB_PATH ?? DEFAULT_DB_PATH,
    eventLogLimit: parseInteger(
      'LEDGER_EVENT_LOG_LIMIT',
      env.LEDGER_EVENT_LOG_LIMIT,
      DEFAULT_EVENT_LOG_LIMIT,
    ),
  };
}

function parseInteger(
  name: string,
  raw: string | undefined,
  fallback: number,
): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a non-negative integer: ${raw}`);
  }
  return Number(raw);
}
