import { Address, Amount } from '../../common/types/common.types';

/**
 * 원장 에러 종류
 *
 * 각 Guard/전제조건 실패는 서로 겹치지 않는 하나의 종류로만 표현됨
 */
export type LedgerErrorKind =
  | 'ZeroAddress'
  | 'ZeroAmount'
  | 'InsufficientBalance'
  | 'InsufficientApproval'
  | 'AllowanceUnderflow'
  | 'Unauthorized'
  | 'Paused'
  | 'Blacklisted'
  | 'ArithmeticOverflow';

/**
 * LedgerError
 *
 * 모든 원장 에러의 기반 클래스
 * - kind로 종류 구분 (instanceof 없이도 분기 가능)
 * - 발생 시 상태 변경은 전혀 일어나지 않음 (all-or-nothing)
 */
export abstract class LedgerError extends Error {
  abstract readonly kind: LedgerErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 필수 주소 인자가 ZERO_ADDRESS
 */
export class ZeroAddressError extends LedgerError {
  readonly kind = 'ZeroAddress';

  constructor(readonly role: string) {
    super(`${role} must not be the zero address`);
  }
}

/**
 * 양수여야 하는 수량이 0
 */
export class ZeroAmountError extends LedgerError {
  readonly kind = 'ZeroAmount';

  constructor(readonly role: string = 'amount') {
    super(`${role} must be greater than zero`);
  }
}

/**
 * 잔액 부족
 */
export class InsufficientBalanceError extends LedgerError {
  readonly kind = 'InsufficientBalance';

  constructor(
    readonly account: Address,
    readonly balance: Amount,
    readonly required: Amount,
  ) {
    super(
      `Insufficient balance for ${account}. Current: ${balance}, Required: ${required}`,
    );
  }
}

/**
 * 위임 전송(transferFrom) 금액이 허용량보다 큼
 */
export class InsufficientApprovalError extends LedgerError {
  readonly kind = 'InsufficientApproval';

  constructor(
    readonly owner: Address,
    readonly spender: Address,
    readonly allowance: Amount,
    readonly required: Amount,
  ) {
    super(
      `Insufficient approval from ${owner} to ${spender}. Current: ${allowance}, Required: ${required}`,
    );
  }
}

/**
 * decreaseAllowance 감소량이 현재 허용량보다 큼
 *
 * InsufficientApproval과 구분됨
 */
export class AllowanceUnderflowError extends LedgerError {
  readonly kind = 'AllowanceUnderflow';

  constructor(
    readonly owner: Address,
    readonly spender: Address,
    readonly allowance: Amount,
    readonly delta: Amount,
  ) {
    super(
      `Allowance underflow for ${owner} -> ${spender}. Current: ${allowance}, Decrease: ${delta}`,
    );
  }
}

/**
 * 관리자 전용 작업을 관리자가 아닌 계정이 호출
 */
export class UnauthorizedError extends LedgerError {
  readonly kind = 'Unauthorized';

  constructor(readonly caller: Address) {
    super(`Caller ${caller} is not the administrator`);
  }
}

/**
 * 일시 정지 상태에서 전송/승인 시도
 */
export class PausedError extends LedgerError {
  readonly kind = 'Paused';

  constructor() {
    super('Ledger is paused');
  }
}

/**
 * 참여자 중 하나가 블랙리스트에 있음
 */
export class BlacklistedError extends LedgerError {
  readonly kind = 'Blacklisted';

  constructor(
    readonly role: string,
    readonly account: Address,
  ) {
    super(`${role} ${account} is blacklisted`);
  }
}

/**
 * 256비트 부호 없는 정수 범위를 벗어남
 */
export class ArithmeticOverflowError extends LedgerError {
  readonly kind = 'ArithmeticOverflow';

  constructor(readonly detail: string) {
    super(`Arithmetic overflow: ${detail}`);
  }
}
