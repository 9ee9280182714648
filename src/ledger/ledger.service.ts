import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import PQueue from 'p-queue';
import { LEDGER_CONFIG, LedgerConfig } from '../common/config/ledger.config';
import { Address, Amount, normalizeAddress } from '../common/types/common.types';
import { formatAmount } from '../common/utils/units.util';
import { LedgerStateManager } from '../state/ledger-state-manager';
import { LedgerMetadata } from '../storage/repositories/ledger.repository.interface';
import {
  approvalEvent,
  blacklistEvent,
  burnEvent,
  LedgerEvent,
  mintEvent,
  pauseEvent,
  transferEvent,
} from './entities/ledger-event.entity';
import {
  AllowanceUnderflowError,
  InsufficientApprovalError,
  InsufficientBalanceError,
  LedgerError,
} from './errors/ledger.errors';
import { LedgerEventSink } from './events/ledger-event-log';
import {
  assertUint256,
  checkedAdd,
  GuardContext,
  LedgerGuard,
  nonZeroAddress,
  nonZeroAmount,
  notBlacklisted,
  onlyAdmin,
  runGuards,
  whenNotPaused,
} from './guards/ledger.guards';

/**
 * 작업 결과
 *
 * - result: 호출자에게 돌려줄 값
 * - event: 커밋 후 싱크에 보낼 이벤트 (정확히 하나)
 * - log: 커밋 후 남길 로그 (관리자 작업만)
 */
interface Outcome<T> {
  result: T;
  event: LedgerEvent;
  log?: string;
}

/**
 * 원장 요약 정보
 */
export interface LedgerInfo extends LedgerMetadata {
  totalSupply: Amount;
  paused: boolean;
}

/**
 * Ledger Service
 *
 * 역할:
 * - 잔액, 허용량, 블랙리스트, 일시 정지, 발행/소각의 모든 상태 전이
 * - 작업마다 Guard 파이프라인을 정해진 순서로 실행
 *
 * 실행 모델:
 * - 모든 작업(조회 포함)은 concurrency 1 큐에서 하나씩 실행
 * - 변경 작업: checkpoint → Guard → 변경 → 커밋 → 이벤트
 * - Guard/전제조건 실패 시 checkpoint 롤백 (저장소는 그대로)
 * - 이벤트는 커밋 직후 큐 안에서 발생하므로 순서 = 커밋 순서
 */
@Injectable()
export class LedgerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LedgerService.name);
  private readonly queue = new PQueue({ concurrency: 1 });

  constructor(
    private readonly stateManager: LedgerStateManager,
    private readonly eventSink: LedgerEventSink,
    @Inject(LEDGER_CONFIG) private readonly config: LedgerConfig,
  ) {}

  /**
   * 저장소 열기 + 최초 실행이면 Genesis 발행
   */
  async onModuleInit(): Promise<void> {
    await this.stateManager.initialize();

    const metadata = await this.queue.add(() =>
      this.stateManager.getMetadata(),
    );
    if (metadata === null) {
      await this.initialize({
        admin: this.config.admin,
        name: this.config.name,
        symbol: this.config.symbol,
        decimals: this.config.decimals,
        initialSupply: this.config.initialSupply,
      });
      return;
    }

    if (metadata.admin !== this.config.admin) {
      this.logger.warn(
        `Configured admin ${this.config.admin} ignored: ledger admin is fixed at ${metadata.admin}`,
      );
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.queue.onIdle();
  }

  /**
   * 원장 생성 (Genesis)
   *
   * - 관리자와 메타데이터 기록
   * - 초기 발행량 전부를 관리자에게 입금
   * - Transfer(ZERO_ADDRESS → admin) 이벤트 1회
   *
   * @throws {Error} 이미 생성된 원장인 경우
   */
  async initialize(
    genesis: LedgerMetadata & { initialSupply: Amount },
  ): Promise<void> {
    const admin = normalizeAddress(genesis.admin);

    await this.execute('initialize', async () => {
      if ((await this.stateManager.getMetadata()) !== null) {
        throw new Error('Ledger is already initialized');
      }
      runGuards(
        { admin, paused: false, blacklisted: new Set() },
        [nonZeroAddress('admin', admin)],
      );
      assertUint256('initialSupply', genesis.initialSupply);

      this.stateManager.setMetadata({
        admin,
        name: genesis.name,
        symbol: genesis.symbol,
        decimals: genesis.decimals,
      });
      this.stateManager.setTotalSupply(genesis.initialSupply);
      this.stateManager.setPaused(false);
      this.stateManager.setBalance(admin, genesis.initialSupply);

      return {
        result: undefined,
        event: mintEvent(admin, genesis.initialSupply),
        log: `Genesis: ${formatAmount(genesis.initialSupply, genesis.decimals, genesis.symbol)} issued to ${admin}`,
      };
    });
  }

  // ─────────────────────────────────────────────
  // 관리자 작업
  // ─────────────────────────────────────────────

  /**
   * 발행
   *
   * Guard 순서: 관리자 → target 블랙리스트 → target 주소 → 수량
   *
   * @returns 발행 후 총 공급량
   */
  async mint(caller: Address, target: Address, amount: Amount): Promise<Amount> {
    const admin = normalizeAddress(caller);
    const to = normalizeAddress(target);

    return this.execute('mint', async () => {
      assertUint256('amount', amount);
      const context = await this.guardContext([to]);
      runGuards(context, [
        onlyAdmin(admin),
        notBlacklisted('target', to),
        nonZeroAddress('target', to),
        nonZeroAmount(amount),
      ]);

      const totalSupply = checkedAdd(
        await this.stateManager.getTotalSupply(),
        amount,
        'total supply',
      );
      const balance = checkedAdd(
        await this.stateManager.getBalance(to),
        amount,
        `balance of ${to}`,
      );
      this.stateManager.setTotalSupply(totalSupply);
      this.stateManager.setBalance(to, balance);

      return {
        result: totalSupply,
        event: mintEvent(to, amount),
        log: `Minted ${await this.format(amount)} to ${to}`,
      };
    });
  }

  /**
   * 소각
   *
   * Guard 순서: 관리자 → source 주소
   * (블랙리스트/0 수량은 검사하지 않음)
   *
   * @returns 소각 후 총 공급량
   */
  async burnFrom(
    caller: Address,
    source: Address,
    amount: Amount,
  ): Promise<Amount> {
    const admin = normalizeAddress(caller);
    const from = normalizeAddress(source);

    return this.execute('burnFrom', async () => {
      assertUint256('amount', amount);
      const context = await this.guardContext([]);
      runGuards(context, [onlyAdmin(admin), nonZeroAddress('source', from)]);

      const balance = await this.stateManager.getBalance(from);
      if (balance < amount) {
        throw new InsufficientBalanceError(from, balance, amount);
      }
      const totalSupply = (await this.stateManager.getTotalSupply()) - amount;
      this.stateManager.setTotalSupply(totalSupply);
      this.stateManager.setBalance(from, balance - amount);

      return {
        result: totalSupply,
        event: burnEvent(from, amount),
        log: `Burned ${await this.format(amount)} from ${from}`,
      };
    });
  }

  async pause(caller: Address): Promise<void> {
    await this.setPaused(caller, true);
  }

  async unpause(caller: Address): Promise<void> {
    await this.setPaused(caller, false);
  }

  async blacklist(caller: Address, account: Address): Promise<void> {
    await this.setBlacklisted(caller, account, true);
  }

  async unblacklist(caller: Address, account: Address): Promise<void> {
    await this.setBlacklisted(caller, account, false);
  }

  // ─────────────────────────────────────────────
  // 전송 / 허용량
  // ─────────────────────────────────────────────

  /**
   * 송금 (sender → receiver)
   *
   * Guard 순서: sender 블랙리스트 → receiver 블랙리스트 → 일시 정지
   *           → 수량 → receiver 주소
   * 전제조건: sender 잔액 >= amount
   *
   * sender === receiver 이면 잔액 변화 없이 성공
   */
  async transfer(
    sender: Address,
    receiver: Address,
    amount: Amount,
  ): Promise<boolean> {
    const from = normalizeAddress(sender);
    const to = normalizeAddress(receiver);

    return this.execute('transfer', async () => {
      assertUint256('amount', amount);
      const context = await this.guardContext([from, to]);
      runGuards(context, [
        notBlacklisted('sender', from),
        notBlacklisted('receiver', to),
        whenNotPaused,
        nonZeroAmount(amount),
        nonZeroAddress('receiver', to),
      ]);

      await this.move(from, to, amount);

      return { result: true, event: transferEvent(from, to, amount) };
    });
  }

  /**
   * 허용량 설정 (덮어쓰기, 더하지 않음)
   *
   * Guard 순서: owner 블랙리스트 → spender 블랙리스트 → 일시 정지 → spender 주소
   * 0은 허용 (승인 취소)
   */
  async approve(
    owner: Address,
    spender: Address,
    amount: Amount,
  ): Promise<boolean> {
    const holder = normalizeAddress(owner);
    const delegate = normalizeAddress(spender);

    return this.execute('approve', async () => {
      assertUint256('amount', amount);
      const context = await this.guardContext([holder, delegate]);
      runGuards(context, this.approvalGuards(holder, delegate));

      this.stateManager.setAllowance(holder, delegate, amount);

      return {
        result: true,
        event: approvalEvent(holder, delegate, amount),
      };
    });
  }

  /**
   * 허용량 증가
   *
   * Guard: approve와 동일 + delta > 0
   */
  async increaseAllowance(
    owner: Address,
    spender: Address,
    delta: Amount,
  ): Promise<boolean> {
    const holder = normalizeAddress(owner);
    const delegate = normalizeAddress(spender);

    return this.execute('increaseAllowance', async () => {
      assertUint256('delta', delta);
      const context = await this.guardContext([holder, delegate]);
      runGuards(context, [
        ...this.approvalGuards(holder, delegate),
        nonZeroAmount(delta, 'delta'),
      ]);

      const allowance = checkedAdd(
        await this.stateManager.getAllowance(holder, delegate),
        delta,
        `allowance of ${holder} -> ${delegate}`,
      );
      this.stateManager.setAllowance(holder, delegate, allowance);

      return {
        result: true,
        event: approvalEvent(holder, delegate, allowance),
      };
    });
  }

  /**
   * 허용량 감소
   *
   * Guard: approve와 동일 + delta > 0
   * 전제조건: delta <= 현재 허용량 (아니면 AllowanceUnderflow)
   */
  async decreaseAllowance(
    owner: Address,
    spender: Address,
    delta: Amount,
  ): Promise<boolean> {
    const holder = normalizeAddress(owner);
    const delegate = normalizeAddress(spender);

    return this.execute('decreaseAllowance', async () => {
      assertUint256('delta', delta);
      const context = await this.guardContext([holder, delegate]);
      runGuards(context, [
        ...this.approvalGuards(holder, delegate),
        nonZeroAmount(delta, 'delta'),
      ]);

      const current = await this.stateManager.getAllowance(holder, delegate);
      if (delta > current) {
        throw new AllowanceUnderflowError(holder, delegate, current, delta);
      }
      const allowance = current - delta;
      this.stateManager.setAllowance(holder, delegate, allowance);

      return {
        result: true,
        event: approvalEvent(holder, delegate, allowance),
      };
    });
  }

  /**
   * 위임 전송 (spender가 owner → receiver로 전송)
   *
   * Guard 순서: spender/owner/receiver 블랙리스트 → 일시 정지
   *           → owner 주소 → receiver 주소 → 수량
   * 전제조건 순서: 허용량 >= amount → owner 잔액 >= amount
   *
   * 허용량 차감, owner 차감, receiver 입금 셋 다 반영되거나 하나도 안 됨
   */
  async transferFrom(
    spender: Address,
    owner: Address,
    receiver: Address,
    amount: Amount,
  ): Promise<boolean> {
    const delegate = normalizeAddress(spender);
    const from = normalizeAddress(owner);
    const to = normalizeAddress(receiver);

    return this.execute('transferFrom', async () => {
      assertUint256('amount', amount);
      const context = await this.guardContext([delegate, from, to]);
      runGuards(context, [
        notBlacklisted('spender', delegate),
        notBlacklisted('owner', from),
        notBlacklisted('receiver', to),
        whenNotPaused,
        nonZeroAddress('owner', from),
        nonZeroAddress('receiver', to),
        nonZeroAmount(amount),
      ]);

      const allowance = await this.stateManager.getAllowance(from, delegate);
      if (allowance < amount) {
        throw new InsufficientApprovalError(from, delegate, allowance, amount);
      }
      const balance = await this.stateManager.getBalance(from);
      if (balance < amount) {
        throw new InsufficientBalanceError(from, balance, amount);
      }

      this.stateManager.setAllowance(from, delegate, allowance - amount);
      await this.move(from, to, amount);

      return { result: true, event: transferEvent(from, to, amount) };
    });
  }

  // ─────────────────────────────────────────────
  // 조회
  // ─────────────────────────────────────────────

  /**
   * 잔액 조회 (처음 보는 계정은 0)
   */
  async balanceOf(account: Address): Promise<Amount> {
    const address = normalizeAddress(account);
    return this.read(async () => {
      runGuards(await this.guardContext([]), [
        nonZeroAddress('account', address),
      ]);
      return this.stateManager.getBalance(address);
    });
  }

  /**
   * 허용량 조회 (설정 안 됐으면 0)
   */
  async allowanceOf(owner: Address, spender: Address): Promise<Amount> {
    const holder = normalizeAddress(owner);
    const delegate = normalizeAddress(spender);
    return this.read(async () => {
      runGuards(await this.guardContext([]), [
        nonZeroAddress('owner', holder),
        nonZeroAddress('spender', delegate),
      ]);
      return this.stateManager.getAllowance(holder, delegate);
    });
  }

  async isBlacklisted(account: Address): Promise<boolean> {
    const address = normalizeAddress(account);
    return this.read(async () => {
      runGuards(await this.guardContext([]), [
        nonZeroAddress('account', address),
      ]);
      return this.stateManager.isBlacklisted(address);
    });
  }

  async totalSupply(): Promise<Amount> {
    return this.read(() => this.stateManager.getTotalSupply());
  }

  async isPaused(): Promise<boolean> {
    return this.read(() => this.stateManager.isPaused());
  }

  /**
   * 관리자 주소
   */
  async owner(): Promise<Address> {
    return this.read(async () => (await this.requireMetadata()).admin);
  }

  async metadata(): Promise<LedgerMetadata> {
    return this.read(() => this.requireMetadata());
  }

  /**
   * 메타데이터 + 총 공급량 + 일시 정지 상태 (하나의 일관된 스냅샷)
   */
  async getInfo(): Promise<LedgerInfo> {
    return this.read(async () => ({
      ...(await this.requireMetadata()),
      totalSupply: await this.stateManager.getTotalSupply(),
      paused: await this.stateManager.isPaused(),
    }));
  }

  // ─────────────────────────────────────────────
  // 내부
  // ─────────────────────────────────────────────

  private async setPaused(caller: Address, paused: boolean): Promise<void> {
    const admin = normalizeAddress(caller);

    await this.execute(paused ? 'pause' : 'unpause', async () => {
      runGuards(await this.guardContext([]), [onlyAdmin(admin)]);

      this.stateManager.setPaused(paused);

      return {
        result: undefined,
        event: pauseEvent(paused),
        log: paused ? 'Ledger paused' : 'Ledger unpaused',
      };
    });
  }

  private async setBlacklisted(
    caller: Address,
    account: Address,
    blacklisted: boolean,
  ): Promise<void> {
    const admin = normalizeAddress(caller);
    const target = normalizeAddress(account);

    await this.execute(blacklisted ? 'blacklist' : 'unblacklist', async () => {
      runGuards(await this.guardContext([]), [
        onlyAdmin(admin),
        nonZeroAddress('account', target),
      ]);

      this.stateManager.setBlacklisted(target, blacklisted);

      return {
        result: undefined,
        event: blacklistEvent(target, blacklisted),
        log: `${blacklisted ? 'Blacklisted' : 'Unblacklisted'} ${target}`,
      };
    });
  }

  private approvalGuards(owner: Address, spender: Address): LedgerGuard[] {
    return [
      notBlacklisted('owner', owner),
      notBlacklisted('spender', spender),
      whenNotPaused,
      nonZeroAddress('spender', spender),
    ];
  }

  /**
   * 잔액 이동 (호출 전에 from 잔액 검사 완료)
   *
   * from 차감 후 to를 다시 읽으므로 from === to 이어도 잔액 유지
   */
  private async move(from: Address, to: Address, amount: Amount): Promise<void> {
    const fromBalance = await this.stateManager.getBalance(from);
    if (fromBalance < amount) {
      throw new InsufficientBalanceError(from, fromBalance, amount);
    }
    this.stateManager.setBalance(from, fromBalance - amount);

    const toBalance = await this.stateManager.getBalance(to);
    this.stateManager.setBalance(
      to,
      checkedAdd(toBalance, amount, `balance of ${to}`),
    );
  }

  /**
   * Guard 평가용 스냅샷
   *
   * @param participants - 블랙리스트 여부를 확인할 계정들
   */
  private async guardContext(participants: Address[]): Promise<GuardContext> {
    const metadata = await this.requireMetadata();
    const blacklisted = new Set<Address>();
    for (const account of participants) {
      if (await this.stateManager.isBlacklisted(account)) {
        blacklisted.add(account);
      }
    }
    return {
      admin: metadata.admin,
      paused: await this.stateManager.isPaused(),
      blacklisted,
    };
  }

  private async requireMetadata(): Promise<LedgerMetadata> {
    const metadata = await this.stateManager.getMetadata();
    if (metadata === null) {
      throw new Error('Ledger is not initialized');
    }
    return metadata;
  }

  private async format(amount: Amount): Promise<string> {
    const { decimals, symbol } = await this.requireMetadata();
    return formatAmount(amount, decimals, symbol);
  }

  /**
   * 조회 작업 실행 (큐에서 순서대로)
   */
  private read<T>(work: () => Promise<T>): Promise<T> {
    return this.queue.add(work);
  }

  /**
   * 변경 작업 실행
   *
   * 1. checkpoint 생성
   * 2. Guard + 변경 (저널에만 기록)
   * 3. 실패 → checkpoint 롤백 후 에러 전파
   * 4. 성공 → 저장소에 커밋
   * 5. 커밋 성공 후에만 이벤트 발생
   */
  private execute<T>(
    operation: string,
    work: () => Promise<Outcome<T>>,
  ): Promise<T> {
    return this.queue.add(async () => {
      this.stateManager.checkpoint();

      let outcome: Outcome<T>;
      try {
        outcome = await work();
      } catch (error) {
        this.stateManager.revertCheckpoint();
        if (error instanceof LedgerError) {
          this.logger.warn(`${operation} rejected (${error.kind}): ${error.message}`);
        }
        throw error;
      }

      this.stateManager.commitCheckpoint();
      try {
        await this.stateManager.commit();
      } catch (error) {
        this.stateManager.rollback();
        this.logger.error(`${operation} failed to commit`, error);
        throw error;
      }

      this.eventSink.emit(outcome.event);
      if (outcome.log) {
        this.logger.log(outcome.log);
      }
      return outcome.result;
    });
  }
}
