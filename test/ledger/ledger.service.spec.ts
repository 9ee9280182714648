import { Test, TestingModule } from '@nestjs/testing';
import { LEDGER_CONFIG, LedgerConfig } from '../../src/common/config/ledger.config';
import {
  UINT256_MAX,
  ZERO_ADDRESS,
} from '../../src/common/constants/ledger.constants';
import { LedgerErrorKind } from '../../src/ledger/errors/ledger.errors';
import {
  LedgerEventLog,
  LedgerEventSink,
} from '../../src/ledger/events/ledger-event-log';
import { LedgerService } from '../../src/ledger/ledger.service';
import { LedgerStateManager } from '../../src/state/ledger-state-manager';
import { LedgerMemoryRepository } from '../../src/storage/repositories/ledger-memory.repository';
import { ILedgerRepository } from '../../src/storage/repositories/ledger.repository.interface';

const ADMIN = '0x' + 'a'.repeat(40);
const USER1 = '0x' + 'b'.repeat(40);
const USER2 = '0x' + 'c'.repeat(40);
const SPENDER = '0x' + 'd'.repeat(40);

const config: LedgerConfig = {
  port: 3000,
  admin: ADMIN,
  initialSupply: 1_000_000n,
  name: 'Mini Dollar',
  symbol: 'mUSD',
  decimals: 6,
  storage: 'memory',
  dbPath: 'unused',
  eventLogLimit: 100,
};

async function expectKind(
  promise: Promise<unknown>,
  kind: LedgerErrorKind,
): Promise<void> {
  await expect(promise).rejects.toMatchObject({ kind });
}

/**
 * LedgerService 테스트
 *
 * 테스트 범위:
 * - Genesis
 * - 송금, 허용량, 위임 전송
 * - 관리자 작업 (발행, 소각, 일시 정지, 블랙리스트)
 * - Guard 순서
 * - 원자성 (실패 시 상태/이벤트 없음)
 * - 불변식 (잔액 합 = 총 공급량)
 */
describe('LedgerService', () => {
  let module: TestingModule;
  let service: LedgerService;
  let repository: LedgerMemoryRepository;
  let eventLog: LedgerEventLog;
  let stateManager: LedgerStateManager;

  beforeEach(async () => {
    repository = new LedgerMemoryRepository();
    eventLog = new LedgerEventLog(config.eventLogLimit);

    module = await Test.createTestingModule({
      providers: [
        LedgerService,
        LedgerStateManager,
        { provide: ILedgerRepository, useValue: repository },
        { provide: LedgerEventLog, useValue: eventLog },
        { provide: LedgerEventSink, useExisting: LedgerEventLog },
        { provide: LEDGER_CONFIG, useValue: config },
      ],
    }).compile();
    await module.init();

    service = module.get<LedgerService>(LedgerService);
    stateManager = module.get<LedgerStateManager>(LedgerStateManager);
  });

  afterEach(async () => {
    await module.close();
    jest.restoreAllMocks();
  });

  const expectSupplyInvariant = async () => {
    const stats = repository.getStats();
    expect(stats.totalBalance).toBe(stats.totalSupply);
    expect(await service.totalSupply()).toBe(stats.totalSupply);
  };

  describe('Genesis', () => {
    it('초기 발행량 전부를 관리자에게 입금해야 함', async () => {
      expect(await service.balanceOf(ADMIN)).toBe(1_000_000n);
      expect(await service.totalSupply()).toBe(1_000_000n);
      expect(await service.owner()).toBe(ADMIN);
      expect(await service.isPaused()).toBe(false);
    });

    it('ZERO_ADDRESS → 관리자 Transfer 이벤트 하나를 기록해야 함', () => {
      expect(eventLog.list()).toEqual([
        expect.objectContaining({
          sequence: 1,
          type: 'Transfer',
          from: ZERO_ADDRESS,
          to: ADMIN,
          amount: 1_000_000n,
        }),
      ]);
    });

    it('메타데이터를 기록해야 함', async () => {
      expect(await service.metadata()).toEqual({
        admin: ADMIN,
        name: 'Mini Dollar',
        symbol: 'mUSD',
        decimals: 6,
      });
      expect(await service.getInfo()).toEqual({
        admin: ADMIN,
        name: 'Mini Dollar',
        symbol: 'mUSD',
        decimals: 6,
        totalSupply: 1_000_000n,
        paused: false,
      });
    });

    it('이미 생성된 원장은 다시 생성할 수 없어야 함', async () => {
      await expect(
        service.initialize({
          admin: USER1,
          name: 'Other',
          symbol: 'OTH',
          decimals: 2,
          initialSupply: 5n,
        }),
      ).rejects.toThrow('Ledger is already initialized');

      expect(await service.owner()).toBe(ADMIN);
      expect(eventLog.lastSequence()).toBe(1);
    });

    it('재시작 시 저장된 관리자를 유지하고 다시 발행하지 않아야 함', async () => {
      const log = new LedgerEventLog(10);
      const restarted = new LedgerService(
        new LedgerStateManager(repository),
        log,
        { ...config, admin: USER1, initialSupply: 42n },
      );

      await restarted.onModuleInit();

      expect(await restarted.owner()).toBe(ADMIN);
      expect(await restarted.totalSupply()).toBe(1_000_000n);
      expect(log.list()).toEqual([]);
    });
  });

  describe('조회', () => {
    it('처음 보는 계정의 잔액은 0이어야 함', async () => {
      expect(await service.balanceOf(USER1)).toBe(0n);
    });

    it('설정되지 않은 허용량은 0이어야 함', async () => {
      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(0n);
    });

    it('대소문자와 관계없이 같은 계정으로 취급해야 함', async () => {
      expect(await service.balanceOf('0x' + 'A'.repeat(40))).toBe(1_000_000n);
    });

    it('ZERO_ADDRESS 조회는 ZeroAddress 에러를 던져야 함', async () => {
      await expectKind(service.balanceOf(ZERO_ADDRESS), 'ZeroAddress');
      await expectKind(service.allowanceOf(ZERO_ADDRESS, USER1), 'ZeroAddress');
      await expectKind(service.allowanceOf(USER1, ZERO_ADDRESS), 'ZeroAddress');
      await expectKind(service.isBlacklisted(ZERO_ADDRESS), 'ZeroAddress');
    });

    it('주소 형식이 아니면 에러를 던져야 함', async () => {
      await expect(service.balanceOf('0x123')).rejects.toThrow(
        'Invalid address: 0x123',
      );
    });
  });

  describe('transfer', () => {
    it('잔액을 이동해야 함 (시나리오 2)', async () => {
      await expect(service.transfer(ADMIN, USER1, 100_000n)).resolves.toBe(true);

      expect(await service.balanceOf(USER1)).toBe(100_000n);
      expect(await service.balanceOf(ADMIN)).toBe(900_000n);
      await expectSupplyInvariant();
    });

    it('Transfer 이벤트를 커밋 후 하나만 기록해야 함', async () => {
      await service.transfer(ADMIN, USER1, 100_000n);

      expect(eventLog.list(2)).toEqual([
        expect.objectContaining({
          sequence: 2,
          type: 'Transfer',
          from: ADMIN,
          to: USER1,
          amount: 100_000n,
        }),
      ]);
    });

    it('자기 자신에게 보내면 잔액이 그대로여야 함', async () => {
      await service.transfer(ADMIN, ADMIN, 300n);

      expect(await service.balanceOf(ADMIN)).toBe(1_000_000n);
      expect(eventLog.lastSequence()).toBe(2);
    });

    it('잔액이 부족하면 InsufficientBalance 에러를 던져야 함', async () => {
      await expect(service.transfer(USER1, USER2, 1n)).rejects.toThrow(
        `Insufficient balance for ${USER1}. Current: 0, Required: 1`,
      );
      expect(eventLog.lastSequence()).toBe(1);
    });

    it('수량 검사가 receiver 주소 검사보다 먼저여야 함', async () => {
      await expectKind(service.transfer(ADMIN, ZERO_ADDRESS, 0n), 'ZeroAmount');
      await expectKind(service.transfer(ADMIN, ZERO_ADDRESS, 5n), 'ZeroAddress');
    });

    it('블랙리스트 검사가 일시 정지 검사보다 먼저여야 함', async () => {
      await service.blacklist(ADMIN, USER1);
      await service.pause(ADMIN);

      await expect(service.transfer(USER1, USER2, 0n)).rejects.toThrow(
        `sender ${USER1} is blacklisted`,
      );
      await expect(service.transfer(ADMIN, USER1, 1n)).rejects.toThrow(
        `receiver ${USER1} is blacklisted`,
      );
      await expectKind(service.transfer(ADMIN, USER2, 0n), 'Paused');
    });

    it('uint256 범위 밖 수량은 ArithmeticOverflow 에러를 던져야 함', async () => {
      await expectKind(service.transfer(ADMIN, USER1, -1n), 'ArithmeticOverflow');
      await expectKind(
        service.transfer(ADMIN, USER1, UINT256_MAX + 1n),
        'ArithmeticOverflow',
      );
    });

    it('동시에 들어온 작업을 하나씩 순서대로 실행해야 함', async () => {
      await Promise.all(
        Array.from({ length: 10 }, () => service.transfer(ADMIN, USER1, 1n)),
      );

      expect(await service.balanceOf(USER1)).toBe(10n);
      expect(eventLog.list().map((event) => event.sequence)).toEqual([
        1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11,
      ]);
      await expectSupplyInvariant();
    });
  });

  describe('허용량', () => {
    it('approve는 더하지 않고 덮어써야 함', async () => {
      await service.approve(ADMIN, SPENDER, 300n);
      await service.approve(ADMIN, SPENDER, 7n);

      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(7n);
    });

    it('approve 0은 승인 취소여야 함', async () => {
      await service.approve(ADMIN, SPENDER, 300n);
      await service.approve(ADMIN, SPENDER, 0n);

      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(0n);
      expect(eventLog.list(3)).toEqual([
        expect.objectContaining({
          type: 'Approval',
          owner: ADMIN,
          spender: SPENDER,
          amount: 0n,
        }),
      ]);
    });

    it('spender가 ZERO_ADDRESS이면 ZeroAddress 에러를 던져야 함', async () => {
      await expectKind(service.approve(ADMIN, ZERO_ADDRESS, 1n), 'ZeroAddress');
    });

    it('increaseAllowance는 변경 후 값으로 Approval 이벤트를 기록해야 함', async () => {
      await service.approve(ADMIN, SPENDER, 10n);
      await service.increaseAllowance(ADMIN, SPENDER, 5n);

      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(15n);
      expect(eventLog.list(3)).toEqual([
        expect.objectContaining({ type: 'Approval', amount: 15n }),
      ]);
    });

    it('increaseAllowance 0은 ZeroAmount 에러를 던져야 함', async () => {
      await expect(
        service.increaseAllowance(ADMIN, SPENDER, 0n),
      ).rejects.toThrow('delta must be greater than zero');
    });

    it('increaseAllowance가 범위를 넘으면 ArithmeticOverflow 에러를 던져야 함', async () => {
      await service.approve(ADMIN, SPENDER, UINT256_MAX);

      await expectKind(
        service.increaseAllowance(ADMIN, SPENDER, 1n),
        'ArithmeticOverflow',
      );
      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(UINT256_MAX);
    });

    it('decreaseAllowance는 허용량을 줄여야 함', async () => {
      await service.approve(ADMIN, SPENDER, 10n);
      await service.decreaseAllowance(ADMIN, SPENDER, 4n);

      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(6n);
    });

    it('현재보다 많이 줄이면 AllowanceUnderflow 에러를 던지고 그대로여야 함 (시나리오 4)', async () => {
      await service.approve(ADMIN, SPENDER, 5n);

      await expect(
        service.decreaseAllowance(ADMIN, SPENDER, 6n),
      ).rejects.toThrow(
        `Allowance underflow for ${ADMIN} -> ${SPENDER}. Current: 5, Decrease: 6`,
      );
      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(5n);
      expect(eventLog.lastSequence()).toBe(2);
    });

    it('decreaseAllowance 0은 ZeroAmount 에러를 던져야 함', async () => {
      await service.approve(ADMIN, SPENDER, 10n);

      await expectKind(
        service.decreaseAllowance(ADMIN, SPENDER, 0n),
        'ZeroAmount',
      );
      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(10n);
    });

    it('블랙리스트 spender는 approve/increase/decrease 대상이 될 수 없어야 함', async () => {
      await service.approve(ADMIN, SPENDER, 10n);
      await service.blacklist(ADMIN, SPENDER);
      const message = `spender ${SPENDER} is blacklisted`;

      await expect(service.approve(ADMIN, SPENDER, 1n)).rejects.toThrow(message);
      await expect(
        service.increaseAllowance(ADMIN, SPENDER, 1n),
      ).rejects.toThrow(message);
      await expect(
        service.decreaseAllowance(ADMIN, SPENDER, 1n),
      ).rejects.toThrow(message);
      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(10n);
      expect(eventLog.lastSequence()).toBe(3);
    });
  });

  describe('transferFrom', () => {
    it('허용량과 잔액을 함께 차감해야 함 (시나리오 3)', async () => {
      await service.approve(ADMIN, SPENDER, 200_000n);
      await expect(
        service.transferFrom(SPENDER, ADMIN, USER2, 60_000n),
      ).resolves.toBe(true);

      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(140_000n);
      expect(await service.balanceOf(USER2)).toBe(60_000n);
      expect(await service.balanceOf(ADMIN)).toBe(940_000n);
      await expectSupplyInvariant();
    });

    it('Transfer 이벤트 하나만 기록해야 함', async () => {
      await service.approve(ADMIN, SPENDER, 200_000n);
      await service.transferFrom(SPENDER, ADMIN, USER2, 60_000n);

      expect(eventLog.list(3)).toEqual([
        expect.objectContaining({
          sequence: 3,
          type: 'Transfer',
          from: ADMIN,
          to: USER2,
          amount: 60_000n,
        }),
      ]);
    });

    it('허용량 검사가 잔액 검사보다 먼저여야 함', async () => {
      await service.transfer(ADMIN, USER1, 10n);
      await service.approve(USER1, SPENDER, 50n);

      await expectKind(
        service.transferFrom(SPENDER, USER1, USER2, 60n),
        'InsufficientApproval',
      );
      await expectKind(
        service.transferFrom(SPENDER, USER1, USER2, 20n),
        'InsufficientBalance',
      );
      expect(await service.allowanceOf(USER1, SPENDER)).toBe(50n);
      expect(await service.balanceOf(USER1)).toBe(10n);
      expect(await service.balanceOf(USER2)).toBe(0n);
    });

    it('owner 주소 검사가 수량 검사보다 먼저여야 함', async () => {
      await expect(
        service.transferFrom(SPENDER, ZERO_ADDRESS, USER2, 0n),
      ).rejects.toThrow('owner must not be the zero address');
    });

    it('spender가 블랙리스트에 있으면 Blacklisted 에러를 던져야 함', async () => {
      await service.approve(ADMIN, SPENDER, 100n);
      await service.blacklist(ADMIN, SPENDER);

      await expect(
        service.transferFrom(SPENDER, ADMIN, USER2, 1n),
      ).rejects.toThrow(`spender ${SPENDER} is blacklisted`);
    });

    it('owner가 블랙리스트에 있으면 Blacklisted 에러를 던져야 함', async () => {
      await service.transfer(ADMIN, USER1, 100n);
      await service.approve(USER1, SPENDER, 50n);
      await service.blacklist(ADMIN, USER1);

      await expect(
        service.transferFrom(SPENDER, USER1, USER2, 1n),
      ).rejects.toThrow(`owner ${USER1} is blacklisted`);
    });

    it('receiver가 블랙리스트에 있으면 Blacklisted 에러를 던져야 함', async () => {
      await service.approve(ADMIN, SPENDER, 100n);
      await service.blacklist(ADMIN, USER2);

      await expect(
        service.transferFrom(SPENDER, ADMIN, USER2, 1n),
      ).rejects.toThrow(`receiver ${USER2} is blacklisted`);
    });

    it('블랙리스트 검사는 spender → owner → receiver 순서여야 함', async () => {
      await service.transfer(ADMIN, USER1, 100n);
      await service.approve(USER1, SPENDER, 50n);
      await service.blacklist(ADMIN, SPENDER);
      await service.blacklist(ADMIN, USER1);
      await service.blacklist(ADMIN, USER2);

      await expect(
        service.transferFrom(SPENDER, USER1, USER2, 1n),
      ).rejects.toThrow(`spender ${SPENDER} is blacklisted`);

      await service.unblacklist(ADMIN, SPENDER);
      await expect(
        service.transferFrom(SPENDER, USER1, USER2, 1n),
      ).rejects.toThrow(`owner ${USER1} is blacklisted`);

      await service.unblacklist(ADMIN, USER1);
      await expect(
        service.transferFrom(SPENDER, USER1, USER2, 1n),
      ).rejects.toThrow(`receiver ${USER2} is blacklisted`);

      await service.unblacklist(ADMIN, USER2);
      await expect(
        service.transferFrom(SPENDER, USER1, USER2, 1n),
      ).resolves.toBe(true);
    });

    it('Guard 실패 시 허용량, 잔액, 이벤트가 그대로여야 함', async () => {
      await service.approve(ADMIN, SPENDER, 100n);
      await service.pause(ADMIN);

      await expectKind(
        service.transferFrom(SPENDER, ADMIN, USER2, 10n),
        'Paused',
      );
      expect(await service.allowanceOf(ADMIN, SPENDER)).toBe(100n);
      expect(await service.balanceOf(ADMIN)).toBe(1_000_000n);
      expect(await service.balanceOf(USER2)).toBe(0n);
      expect(eventLog.lastSequence()).toBe(3);
    });
  });

  describe('mint', () => {
    it('총 공급량과 대상 잔액을 늘려야 함', async () => {
      await expect(service.mint(ADMIN, USER1, 123n)).resolves.toBe(1_000_123n);

      expect(await service.balanceOf(USER1)).toBe(123n);
      expect(eventLog.list(2)).toEqual([
        expect.objectContaining({
          type: 'Transfer',
          from: ZERO_ADDRESS,
          to: USER1,
          amount: 123n,
        }),
      ]);
      await expectSupplyInvariant();
    });

    it('관리자 검사가 블랙리스트 검사보다 먼저여야 함', async () => {
      await service.blacklist(ADMIN, USER1);

      await expect(service.mint(USER2, USER1, 1n)).rejects.toThrow(
        `Caller ${USER2} is not the administrator`,
      );
      await expect(service.mint(ADMIN, USER1, 1n)).rejects.toThrow(
        `target ${USER1} is blacklisted`,
      );
    });

    it('범위 검사가 관리자 검사보다 먼저여야 함', async () => {
      await expectKind(service.mint(USER2, USER1, -5n), 'ArithmeticOverflow');
    });

    it('0 수량은 ZeroAmount 에러를 던져야 함', async () => {
      await expectKind(service.mint(ADMIN, USER1, 0n), 'ZeroAmount');
      await expectKind(service.mint(ADMIN, ZERO_ADDRESS, 0n), 'ZeroAddress');
    });

    it('총 공급량이 범위를 넘으면 ArithmeticOverflow 에러를 던지고 그대로여야 함', async () => {
      await expect(
        service.mint(ADMIN, USER1, UINT256_MAX - 1_000_000n + 1n),
      ).rejects.toThrow('Arithmetic overflow: total supply would exceed uint256');

      expect(await service.totalSupply()).toBe(1_000_000n);
      expect(await service.balanceOf(USER1)).toBe(0n);
    });
  });

  describe('burnFrom', () => {
    it('총 공급량과 대상 잔액을 줄여야 함', async () => {
      await service.transfer(ADMIN, USER1, 500n);

      await expect(service.burnFrom(ADMIN, USER1, 200n)).resolves.toBe(
        999_800n,
      );
      expect(await service.balanceOf(USER1)).toBe(300n);
      expect(eventLog.list(3)).toEqual([
        expect.objectContaining({
          type: 'Transfer',
          from: USER1,
          to: ZERO_ADDRESS,
          amount: 200n,
        }),
      ]);
      await expectSupplyInvariant();
    });

    it('관리자가 아니면 Unauthorized 에러를 던져야 함', async () => {
      await expectKind(service.burnFrom(USER1, ADMIN, 1n), 'Unauthorized');
    });

    it('잔액보다 많이 소각하면 InsufficientBalance 에러를 던져야 함', async () => {
      await expectKind(service.burnFrom(ADMIN, USER1, 1n), 'InsufficientBalance');
      await expectKind(service.burnFrom(ADMIN, ZERO_ADDRESS, 1n), 'ZeroAddress');
    });

    it('블랙리스트 계정에서도 소각할 수 있어야 함', async () => {
      await service.transfer(ADMIN, USER1, 10n);
      await service.blacklist(ADMIN, USER1);

      await expect(service.burnFrom(ADMIN, USER1, 10n)).resolves.toBe(
        999_990n,
      );
      expect(await service.balanceOf(USER1)).toBe(0n);
    });

    it('0 수량도 허용하고 이벤트를 기록해야 함', async () => {
      await expect(service.burnFrom(ADMIN, USER1, 0n)).resolves.toBe(
        1_000_000n,
      );
      expect(eventLog.list(2)).toEqual([
        expect.objectContaining({
          type: 'Transfer',
          from: USER1,
          to: ZERO_ADDRESS,
          amount: 0n,
        }),
      ]);
    });
  });

  describe('일시 정지', () => {
    it('일시 정지 중에는 전송/승인/위임 전송이 실패해야 함 (시나리오 6)', async () => {
      await service.approve(ADMIN, SPENDER, 100n);
      await service.pause(ADMIN);

      await expectKind(service.transfer(ADMIN, USER1, 1n), 'Paused');
      await expectKind(service.approve(ADMIN, SPENDER, 1n), 'Paused');
      await expectKind(service.increaseAllowance(ADMIN, SPENDER, 1n), 'Paused');
      await expectKind(service.decreaseAllowance(ADMIN, SPENDER, 1n), 'Paused');
      await expectKind(
        service.transferFrom(SPENDER, ADMIN, USER2, 1n),
        'Paused',
      );
    });

    it('일시 정지 중에도 발행과 블랙리스트는 가능해야 함', async () => {
      await service.pause(ADMIN);

      await expect(service.mint(ADMIN, USER1, 5n)).resolves.toBe(1_000_005n);
      await expect(service.blacklist(ADMIN, USER2)).resolves.toBeUndefined();
      expect(await service.isBlacklisted(USER2)).toBe(true);
    });

    it('두 번 호출해도 한 번과 같아야 함', async () => {
      await service.pause(ADMIN);
      await service.pause(ADMIN);
      expect(await service.isPaused()).toBe(true);

      await service.unpause(ADMIN);
      expect(await service.isPaused()).toBe(false);
      await expect(service.transfer(ADMIN, USER1, 1n)).resolves.toBe(true);
    });

    it('PauseUpdated 이벤트를 기록해야 함', async () => {
      await service.pause(ADMIN);
      await service.unpause(ADMIN);

      expect(eventLog.list(2)).toEqual([
        expect.objectContaining({ sequence: 2, type: 'PauseUpdated', paused: true }),
        expect.objectContaining({ sequence: 3, type: 'PauseUpdated', paused: false }),
      ]);
    });

    it('관리자가 아니면 Unauthorized 에러를 던져야 함', async () => {
      await expectKind(service.pause(USER1), 'Unauthorized');
      await expectKind(service.unpause(USER1), 'Unauthorized');
      expect(await service.isPaused()).toBe(false);
    });
  });

  describe('블랙리스트', () => {
    it('블랙리스트 계정은 전송할 수 없고 해제 후에는 가능해야 함 (시나리오 5)', async () => {
      await service.transfer(ADMIN, USER1, 10n);
      await service.blacklist(ADMIN, USER1);

      await expectKind(service.transfer(USER1, USER2, 10n), 'Blacklisted');
      expect(await service.balanceOf(USER1)).toBe(10n);

      await service.unblacklist(ADMIN, USER1);
      await expect(service.transfer(USER1, USER2, 10n)).resolves.toBe(true);
      expect(await service.balanceOf(USER2)).toBe(10n);
    });

    it('두 번 추가해도 한 번과 같아야 함', async () => {
      await service.blacklist(ADMIN, USER1);
      await service.blacklist(ADMIN, USER1);

      expect(await service.isBlacklisted(USER1)).toBe(true);
      expect(repository.getStats().blacklisted).toBe(1);
    });

    it('BlacklistUpdated 이벤트를 기록해야 함', async () => {
      await service.blacklist(ADMIN, USER1);
      await service.unblacklist(ADMIN, USER1);

      expect(eventLog.list(2)).toEqual([
        expect.objectContaining({
          type: 'BlacklistUpdated',
          account: USER1,
          blacklisted: true,
        }),
        expect.objectContaining({
          type: 'BlacklistUpdated',
          account: USER1,
          blacklisted: false,
        }),
      ]);
    });

    it('관리자 검사가 주소 검사보다 먼저여야 함', async () => {
      await expectKind(service.blacklist(USER1, ZERO_ADDRESS), 'Unauthorized');
      await expectKind(service.blacklist(ADMIN, ZERO_ADDRESS), 'ZeroAddress');
    });

    it('블랙리스트 owner는 approve할 수 없어야 함', async () => {
      await service.blacklist(ADMIN, USER1);

      await expect(service.approve(USER1, SPENDER, 1n)).rejects.toThrow(
        `owner ${USER1} is blacklisted`,
      );
    });
  });

  describe('원자성', () => {
    it('저장소 커밋이 실패하면 상태와 이벤트가 그대로여야 함', async () => {
      jest
        .spyOn(repository, 'commit')
        .mockRejectedValueOnce(new Error('disk full'));

      await expect(service.transfer(ADMIN, USER1, 10n)).rejects.toThrow(
        'disk full',
      );

      expect(await service.balanceOf(ADMIN)).toBe(1_000_000n);
      expect(await service.balanceOf(USER1)).toBe(0n);
      expect(eventLog.lastSequence()).toBe(1);
      expect(stateManager.getJournalStats()).toEqual({ size: 0, depth: 0 });
    });

    it('Guard 실패 후에는 저널이 비어 있어야 함', async () => {
      await expectKind(service.mint(USER1, USER1, 1n), 'Unauthorized');

      expect(stateManager.getJournalStats()).toEqual({ size: 0, depth: 0 });
    });

    it('여러 작업 후에도 잔액 합이 총 공급량과 같아야 함', async () => {
      await service.transfer(ADMIN, USER1, 1_000n);
      await service.mint(ADMIN, USER2, 77n);
      await service.approve(USER1, SPENDER, 500n);
      await service.transferFrom(SPENDER, USER1, USER2, 400n);
      await service.burnFrom(ADMIN, USER2, 100n);
      await expectKind(service.transfer(USER1, USER2, 601n), 'InsufficientBalance');

      expect(await service.balanceOf(USER1)).toBe(600n);
      expect(await service.balanceOf(USER2)).toBe(377n);
      expect(await service.totalSupply()).toBe(999_977n);
      await expectSupplyInvariant();
    });
  });
});
