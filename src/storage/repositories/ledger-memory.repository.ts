import { Injectable } from '@nestjs/common';
import { Address, Amount } from '../../common/types/common.types';
import {
  allowanceKey,
  ILedgerRepository,
  LedgerChangeSet,
  LedgerMetadata,
} from './ledger.repository.interface';

/**
 * In-Memory Ledger Repository
 *
 * 현재 구현:
 * - Map/Set으로 메모리에 저장
 * - 빠른 개발 및 테스트
 * - 서버 재시작 시 데이터 소실
 *
 * 원자성:
 * - commit()은 await 없이 한 번에 반영되므로 중간 상태가 보이지 않음
 *
 * 교체:
 * - LEDGER_STORAGE=leveldb 이면 LedgerLevelDBRepository 사용
 * - 인터페이스 동일하므로 Service 변경 불필요
 */
@Injectable()
export class LedgerMemoryRepository extends ILedgerRepository {
  private metadata: LedgerMetadata | null = null;
  private totalSupply: Amount = 0n;
  private paused = false;
  private readonly balances = new Map<Address, Amount>();
  private readonly allowances = new Map<string, Amount>();
  private readonly blacklist = new Set<Address>();

  async initialize(): Promise<void> {
    // 메모리 저장소는 열 것이 없음
  }

  async getMetadata(): Promise<LedgerMetadata | null> {
    return this.metadata ? { ...this.metadata } : null;
  }

  async getTotalSupply(): Promise<Amount> {
    return this.totalSupply;
  }

  async isPaused(): Promise<boolean> {
    return this.paused;
  }

  async getBalance(address: Address): Promise<Amount> {
    return this.balances.get(address) ?? 0n;
  }

  async getAllowance(owner: Address, spender: Address): Promise<Amount> {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  async isBlacklisted(address: Address): Promise<boolean> {
    return this.blacklist.has(address);
  }

  async commit(changes: LedgerChangeSet): Promise<void> {
    if (changes.metadata !== undefined) {
      this.metadata = { ...changes.metadata };
    }
    if (changes.totalSupply !== undefined) {
      this.totalSupply = changes.totalSupply;
    }
    if (changes.paused !== undefined) {
      this.paused = changes.paused;
    }

    // 0은 저장하지 않음 (없는 키 = 0)
    for (const [address, amount] of changes.balances) {
      if (amount === 0n) {
        this.balances.delete(address);
      } else {
        this.balances.set(address, amount);
      }
    }
    for (const [key, amount] of changes.allowances) {
      if (amount === 0n) {
        this.allowances.delete(key);
      } else {
        this.allowances.set(key, amount);
      }
    }
    for (const [address, blocked] of changes.blacklist) {
      if (blocked) {
        this.blacklist.add(address);
      } else {
        this.blacklist.delete(address);
      }
    }
  }

  async close(): Promise<void> {
    // 메모리 저장소는 닫을 것이 없음
  }

  /**
   * 통계 정보 (디버깅, 불변식 검사용)
   *
   * totalBalance는 항상 totalSupply와 같아야 함
   */
  getStats() {
    let totalBalance = 0n;
    for (const amount of this.balances.values()) {
      totalBalance += amount;
    }

    return {
      totalAccounts: this.balances.size,
      totalBalance,
      totalSupply: this.totalSupply,
      blacklisted: this.blacklist.size,
    };
  }
}
