import { Injectable, Logger } from '@nestjs/common';
import { Address, Amount } from '../common/types/common.types';
import {
  allowanceKey,
  createChangeSet,
  ILedgerRepository,
  isEmptyChangeSet,
  LedgerChangeSet,
  LedgerMetadata,
} from '../storage/repositories/ledger.repository.interface';

/**
 * LedgerStateManager
 *
 * 역할:
 * - 작업 실행 중 임시 상태 관리 (저널링)
 * - 작업 성공 시 ILedgerRepository에 한 번에 커밋
 * - 작업 실패 시 저널만 버리면 저장소는 그대로
 *
 * 조회 순서:
 * - 저널 스택 (최상단부터) → ILedgerRepository
 *
 * 저널 스택:
 * - 중첩된 checkpoint 지원
 * - 각 레벨은 독립적인 LedgerChangeSet
 */
@Injectable()
export class LedgerStateManager {
  private readonly logger = new Logger(LedgerStateManager.name);

  private journalStack: LedgerChangeSet[] = [];

  constructor(private readonly repository: ILedgerRepository) {}

  /**
   * 저장소 열기
   */
  async initialize(): Promise<void> {
    await this.repository.initialize();
  }

  async getMetadata(): Promise<LedgerMetadata | null> {
    for (let i = this.journalStack.length - 1; i >= 0; i--) {
      const metadata = this.journalStack[i].metadata;
      if (metadata !== undefined) {
        return metadata;
      }
    }
    return this.repository.getMetadata();
  }

  async getTotalSupply(): Promise<Amount> {
    for (let i = this.journalStack.length - 1; i >= 0; i--) {
      const totalSupply = this.journalStack[i].totalSupply;
      if (totalSupply !== undefined) {
        return totalSupply;
      }
    }
    return this.repository.getTotalSupply();
  }

  async isPaused(): Promise<boolean> {
    for (let i = this.journalStack.length - 1; i >= 0; i--) {
      const paused = this.journalStack[i].paused;
      if (paused !== undefined) {
        return paused;
      }
    }
    return this.repository.isPaused();
  }

  async getBalance(address: Address): Promise<Amount> {
    const journaled = this.findInJournal((changes) =>
      changes.balances.get(address),
    );
    return journaled ?? this.repository.getBalance(address);
  }

  async getAllowance(owner: Address, spender: Address): Promise<Amount> {
    const key = allowanceKey(owner, spender);
    const journaled = this.findInJournal((changes) =>
      changes.allowances.get(key),
    );
    return journaled ?? this.repository.getAllowance(owner, spender);
  }

  async isBlacklisted(address: Address): Promise<boolean> {
    const journaled = this.findInJournal((changes) =>
      changes.blacklist.get(address),
    );
    return journaled ?? this.repository.isBlacklisted(address);
  }

  setMetadata(metadata: LedgerMetadata): void {
    this.topJournal().metadata = { ...metadata };
  }

  setTotalSupply(amount: Amount): void {
    this.topJournal().totalSupply = amount;
  }

  setPaused(paused: boolean): void {
    this.topJournal().paused = paused;
  }

  setBalance(address: Address, amount: Amount): void {
    this.topJournal().balances.set(address, amount);
  }

  setAllowance(owner: Address, spender: Address, amount: Amount): void {
    this.topJournal().allowances.set(allowanceKey(owner, spender), amount);
  }

  setBlacklisted(address: Address, blacklisted: boolean): void {
    this.topJournal().blacklist.set(address, blacklisted);
  }

  /**
   * Checkpoint 생성: 스택에 새 레벨 추가 (중첩 지원)
   */
  checkpoint(): void {
    this.journalStack.push(createChangeSet());
  }

  /**
   * Checkpoint 커밋: 스택 최상단 pop 후 하위 레벨에 병합
   *
   * 최하위 레벨이면 그대로 남겨둠 (commit()에서 저장)
   */
  commitCheckpoint(): void {
    if (this.journalStack.length === 0) {
      throw new Error('Cannot commit: journal stack is empty');
    }
    if (this.journalStack.length === 1) {
      return;
    }

    const top = this.journalStack.pop();
    const lower = this.journalStack[this.journalStack.length - 1];
    if (top) {
      mergeInto(lower, top);
    }
  }

  /**
   * Checkpoint 롤백: 스택 최상단 pop만 (저장 안 함)
   */
  revertCheckpoint(): void {
    if (this.journalStack.length === 0) {
      throw new Error('Cannot revert: journal stack is empty');
    }
    this.journalStack.pop();
  }

  /**
   * 저널 전체를 ILedgerRepository에 커밋
   *
   * - 모든 레벨을 병합 (최상단이 우선)
   * - repository.commit() 한 번 → 원자적 반영
   * - 성공하면 스택 초기화
   * - 실패하면 스택은 그대로 두고 에러 전파 (호출자가 rollback)
   */
  async commit(): Promise<void> {
    if (this.journalStack.length === 0) {
      return;
    }

    const merged = createChangeSet();
    for (const journal of this.journalStack) {
      mergeInto(merged, journal);
    }

    if (!isEmptyChangeSet(merged)) {
      try {
        await this.repository.commit(merged);
      } catch (error) {
        this.logger.error('Failed to commit journal to repository', error);
        throw error;
      }
    }

    this.journalStack = [];
  }

  /**
   * 저널 전체 롤백 (변경사항 취소)
   */
  rollback(): void {
    this.journalStack = [];
  }

  /**
   * 저널 통계
   */
  getJournalStats(): { size: number; depth: number } {
    let size = 0;
    for (const journal of this.journalStack) {
      size +=
        journal.balances.size + journal.allowances.size + journal.blacklist.size;
    }
    return { size, depth: this.journalStack.length };
  }

  private topJournal(): LedgerChangeSet {
    if (this.journalStack.length === 0) {
      // 스택이 비어있으면 새 checkpoint 생성
      this.journalStack.push(createChangeSet());
    }
    return this.journalStack[this.journalStack.length - 1];
  }

  /**
   * 저널 스택 최상단부터 값 찾기
   */
  private findInJournal<T>(
    pick: (changes: LedgerChangeSet) => T | undefined,
  ): T | undefined {
    for (let i = this.journalStack.length - 1; i >= 0; i--) {
      const value = pick(this.journalStack[i]);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }
}

/**
 * source의 변경사항을 target에 덮어쓰기
 */
function mergeInto(target: LedgerChangeSet, source: LedgerChangeSet): void {
  for (const [address, amount] of source.balances) {
    target.balances.set(address, amount);
  }
  for (const [key, amount] of source.allowances) {
    target.allowances.set(key, amount);
  }
  for (const [address, blocked] of source.blacklist) {
    target.blacklist.set(address, blocked);
  }
  if (source.totalSupply !== undefined) {
    target.totalSupply = source.totalSupply;
  }
  if (source.paused !== undefined) {
    target.paused = source.paused;
  }
  if (source.metadata !== undefined) {
    target.metadata = source.metadata;
  }
}
