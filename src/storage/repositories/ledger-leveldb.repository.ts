import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ClassicLevel } from 'classic-level';
import { LRUCache } from 'lru-cache';
import { Address, Amount } from '../../common/types/common.types';
import {
  allowanceKey,
  ILedgerRepository,
  LedgerChangeSet,
  LedgerMetadata,
} from './ledger.repository.interface';

/**
 * 저장 키
 *
 * - "meta"                      → JSON(LedgerMetadata)
 * - "supply"                    → 총 공급량 (10진수 문자열)
 * - "paused"                    → "1" | "0"
 * - "b:" + address              → 잔액 (10진수 문자열, 0이면 키 삭제)
 * - "a:" + owner + ":" + spender → 허용량 (10진수 문자열, 0이면 키 삭제)
 * - "x:" + address              → "1" (블랙리스트, 해제 시 키 삭제)
 */
const META_KEY = 'meta';
const SUPPLY_KEY = 'supply';
const PAUSED_KEY = 'paused';
const balanceKey = (address: Address) => `b:${address}`;
const allowanceDbKey = (key: string) => `a:${key}`;
const blacklistKey = (address: Address) => `x:${address}`;

// 캐시에서 "키 없음"을 나타내는 값 (실제 저장값은 빈 문자열이 될 수 없음)
const ABSENT = '';

/**
 * LedgerLevelDBRepository
 *
 * 저장 방식:
 * - classic-level (LevelDB) 단일 DB
 * - Prefix로 데이터 타입 구분
 * - commit()은 Batch 하나로 기록 → 모두 성공 or 모두 실패
 *
 * 캐시:
 * - 최근 읽은 키를 LRU로 보관 (Batch 기록 성공 후에만 갱신)
 */
@Injectable()
export class LedgerLevelDBRepository
  extends ILedgerRepository
  implements OnApplicationShutdown
{
  private readonly logger = new Logger(LedgerLevelDBRepository.name);
  private readonly db: ClassicLevel<string, string>;
  private readonly cache: LRUCache<string, string>;

  constructor(private readonly location: string) {
    super();
    this.db = new ClassicLevel<string, string>(location, {
      valueEncoding: 'utf8',
    });
    this.cache = new LRUCache<string, string>({ max: 10000 });
  }

  /**
   * DB 열기 (이미 열려 있으면 아무것도 안 함)
   */
  async initialize(): Promise<void> {
    if (this.db.status === 'open') {
      return;
    }
    try {
      await this.db.open();
      this.logger.log(`Ledger LevelDB opened: ${this.location}`);
    } catch (error) {
      this.logger.error(`Failed to open Ledger LevelDB ${this.location}`, error);
      throw error;
    }
  }

  async getMetadata(): Promise<LedgerMetadata | null> {
    const raw = await this.read(META_KEY);
    if (raw === undefined) {
      return null;
    }
    return parseMetadata(raw);
  }

  async getTotalSupply(): Promise<Amount> {
    return this.readAmount(SUPPLY_KEY);
  }

  async isPaused(): Promise<boolean> {
    return (await this.read(PAUSED_KEY)) === '1';
  }

  async getBalance(address: Address): Promise<Amount> {
    return this.readAmount(balanceKey(address));
  }

  async getAllowance(owner: Address, spender: Address): Promise<Amount> {
    return this.readAmount(allowanceDbKey(allowanceKey(owner, spender)));
  }

  async isBlacklisted(address: Address): Promise<boolean> {
    return (await this.read(blacklistKey(address))) === '1';
  }

  /**
   * 변경사항 일괄 기록 (Batch)
   *
   * 1. 변경사항 → put/del 목록
   * 2. batch.write() 한 번으로 원자적 기록
   * 3. 기록 성공 후에만 캐시 갱신
   */
  async commit(changes: LedgerChangeSet): Promise<void> {
    const writes = new Map<string, string>(); // key → value (ABSENT = 삭제)

    if (changes.metadata !== undefined) {
      writes.set(META_KEY, JSON.stringify(changes.metadata));
    }
    if (changes.totalSupply !== undefined) {
      writes.set(SUPPLY_KEY, changes.totalSupply.toString());
    }
    if (changes.paused !== undefined) {
      writes.set(PAUSED_KEY, changes.paused ? '1' : '0');
    }
    for (const [address, amount] of changes.balances) {
      writes.set(balanceKey(address), amount === 0n ? ABSENT : amount.toString());
    }
    for (const [key, amount] of changes.allowances) {
      writes.set(allowanceDbKey(key), amount === 0n ? ABSENT : amount.toString());
    }
    for (const [address, blocked] of changes.blacklist) {
      writes.set(blacklistKey(address), blocked ? '1' : ABSENT);
    }

    try {
      const batch = this.db.batch();
      for (const [key, value] of writes) {
        if (value === ABSENT) {
          batch.del(key);
        } else {
          batch.put(key, value);
        }
      }
      await batch.write();
    } catch (error) {
      this.logger.error('Failed to commit ledger changes', error);
      throw error;
    }

    for (const [key, value] of writes) {
      this.cache.set(key, value);
    }
  }

  // 모든 onModuleDestroy(LedgerService 큐 비우기) 이후에 호출됨
  async onApplicationShutdown(): Promise<void> {
    await this.close();
  }

  async close(): Promise<void> {
    if (this.db.status === 'open') {
      await this.db.close();
      this.cache.clear();
    }
  }

  /**
   * 키 조회 (캐시 → LevelDB)
   *
   * @returns 값, 없으면 undefined
   */
  private async read(key: string): Promise<string | undefined> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached === ABSENT ? undefined : cached;
    }

    let value: string | undefined;
    try {
      value = (await this.db.get(key)) ?? undefined;
    } catch (error) {
      if (!isNotFoundError(error)) {
        this.logger.error(`Failed to read ${key}`, error);
        throw error;
      }
      value = undefined;
    }

    this.cache.set(key, value ?? ABSENT);
    return value;
  }

  private async readAmount(key: string): Promise<Amount> {
    const raw = await this.read(key);
    return raw === undefined ? 0n : BigInt(raw);
  }
}

/**
 * 저장된 메타데이터 JSON 검증
 */
function parseMetadata(raw: string): LedgerMetadata {
  const value: unknown = JSON.parse(raw);
  if (
    typeof value === 'object' &&
    value !== null &&
    'admin' in value &&
    typeof value.admin === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'symbol' in value &&
    typeof value.symbol === 'string' &&
    'decimals' in value &&
    typeof value.decimals === 'number'
  ) {
    return {
      admin: value.admin,
      name: value.name,
      symbol: value.symbol,
      decimals: value.decimals,
    };
  }
  throw new Error(`Corrupted ledger metadata: ${raw}`);
}

/**
 * classic-level은 없는 키 조회 시 LEVEL_NOT_FOUND 에러를 던짐
 */
function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'LEVEL_NOT_FOUND'
  );
}
