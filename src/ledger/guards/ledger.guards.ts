import {
  UINT256_MAX,
  ZERO_ADDRESS,
} from '../../common/constants/ledger.constants';
import { Address, Amount } from '../../common/types/common.types';
import {
  ArithmeticOverflowError,
  BlacklistedError,
  PausedError,
  UnauthorizedError,
  ZeroAddressError,
  ZeroAmountError,
} from '../errors/ledger.errors';

/**
 * Guard 평가에 필요한 상태 스냅샷
 *
 * 작업 시작 시 한 번 읽어서 만들고, 모든 Guard가 같은 스냅샷을 봄
 * - blacklisted: 이번 작업에 참여하는 계정 중 블랙리스트에 있는 계정만
 */
export interface GuardContext {
  readonly admin: Address;
  readonly paused: boolean;
  readonly blacklisted: ReadonlySet<Address>;
}

/**
 * Guard
 *
 * (호출자, 인자, 현재 상태)에 대한 독립적인 조건
 * - 통과하면 아무 일도 하지 않음
 * - 실패하면 해당 종류의 LedgerError를 던짐
 */
export type LedgerGuard = (context: GuardContext) => void;

/**
 * Guard 파이프라인 실행
 *
 * 배열 순서대로 평가하고, 첫 실패에서 바로 중단
 * (순서가 곧 에러 우선순위)
 */
export function runGuards(
  context: GuardContext,
  guards: readonly LedgerGuard[],
): void {
  for (const guard of guards) {
    guard(context);
  }
}

/**
 * 주소 인자가 ZERO_ADDRESS가 아니어야 함
 */
export function nonZeroAddress(role: string, address: Address): LedgerGuard {
  return () => {
    if (address === ZERO_ADDRESS) {
      throw new ZeroAddressError(role);
    }
  };
}

/**
 * 관리자만 호출 가능
 */
export function onlyAdmin(caller: Address): LedgerGuard {
  return (context) => {
    if (caller !== context.admin) {
      throw new UnauthorizedError(caller);
    }
  };
}

/**
 * 해당 역할(sender, receiver, spender 등)의 계정이 블랙리스트에 없어야 함
 */
export function notBlacklisted(role: string, account: Address): LedgerGuard {
  return (context) => {
    if (context.blacklisted.has(account)) {
      throw new BlacklistedError(role, account);
    }
  };
}

/**
 * 일시 정지 상태가 아니어야 함
 */
export const whenNotPaused: LedgerGuard = (context) => {
  if (context.paused) {
    throw new PausedError();
  }
};

/**
 * 수량이 0보다 커야 함
 */
export function nonZeroAmount(amount: Amount, role = 'amount'): LedgerGuard {
  return () => {
    if (amount === 0n) {
      throw new ZeroAmountError(role);
    }
  };
}

/**
 * 수량 인자가 uint256 범위(0 ~ 2^256 - 1) 안에 있는지 확인
 *
 * 상태를 읽는 Guard보다 먼저 실행됨
 */
export function assertUint256(role: string, value: Amount): void {
  if (value < 0n || value > UINT256_MAX) {
    throw new ArithmeticOverflowError(`${role} ${value} is outside uint256`);
  }
}

/**
 * 덧셈 (범위 초과 시 ArithmeticOverflow)
 */
export function checkedAdd(a: Amount, b: Amount, what: string): Amount {
  const result = a + b;
  if (result > UINT256_MAX) {
    throw new ArithmeticOverflowError(`${what} would exceed uint256`);
  }
  return result;
}
