import { ZERO_ADDRESS } from '../../common/constants/ledger.constants';
import { Address, Amount } from '../../common/types/common.types';

/**
 * 원장 이벤트
 *
 * 성공한 변경 작업마다 정확히 하나씩, 커밋 이후에 발생
 *
 * - Transfer: 잔액 이동 (from = ZERO_ADDRESS → 발행, to = ZERO_ADDRESS → 소각)
 * - Approval: 허용량 변경 (변경 후 값)
 * - BlacklistUpdated: 블랙리스트 추가/해제
 * - PauseUpdated: 일시 정지/재개
 */
export type LedgerEvent =
  | { type: 'Transfer'; from: Address; to: Address; amount: Amount }
  | { type: 'Approval'; owner: Address; spender: Address; amount: Amount }
  | { type: 'BlacklistUpdated'; account: Address; blacklisted: boolean }
  | { type: 'PauseUpdated'; paused: boolean };

/**
 * 싱크에 기록된 이벤트
 *
 * - sequence: 1부터 단조 증가 (커밋 순서와 동일)
 * - timestamp: 기록 시각 (ms)
 */
export type RecordedLedgerEvent = LedgerEvent & {
  sequence: number;
  timestamp: number;
};

export function transferEvent(
  from: Address,
  to: Address,
  amount: Amount,
): LedgerEvent {
  return { type: 'Transfer', from, to, amount };
}

export function mintEvent(to: Address, amount: Amount): LedgerEvent {
  return transferEvent(ZERO_ADDRESS, to, amount);
}

export function burnEvent(from: Address, amount: Amount): LedgerEvent {
  return transferEvent(from, ZERO_ADDRESS, amount);
}

export function approvalEvent(
  owner: Address,
  spender: Address,
  amount: Amount,
): LedgerEvent {
  return { type: 'Approval', owner, spender, amount };
}

export function blacklistEvent(
  account: Address,
  blacklisted: boolean,
): LedgerEvent {
  return { type: 'BlacklistUpdated', account, blacklisted };
}

export function pauseEvent(paused: boolean): LedgerEvent {
  return { type: 'PauseUpdated', paused };
}

/**
 * 이벤트를 JSON 응답용 객체로 변환 (bigint → 10진수 문자열)
 */
export function serializeEvent(
  event: RecordedLedgerEvent,
): Record<string, string | number | boolean> {
  switch (event.type) {
    case 'Transfer':
      return {
        sequence: event.sequence,
        timestamp: event.timestamp,
        type: event.type,
        from: event.from,
        to: event.to,
        amount: event.amount.toString(),
      };
    case 'Approval':
      return {
        sequence: event.sequence,
        timestamp: event.timestamp,
        type: event.type,
        owner: event.owner,
        spender: event.spender,
        amount: event.amount.toString(),
      };
    case 'BlacklistUpdated':
      return {
        sequence: event.sequence,
        timestamp: event.timestamp,
        type: event.type,
        account: event.account,
        blacklisted: event.blacklisted,
      };
    case 'PauseUpdated':
      return {
        sequence: event.sequence,
        timestamp: event.timestamp,
        type: event.type,
        paused: event.paused,
      };
  }
}
