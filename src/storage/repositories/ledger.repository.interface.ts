import { Address, Amount } from '../../common/types/common.types';

/**
 * 원장 메타데이터
 *
 * 생성(genesis) 시 한 번 기록되고 이후 바뀌지 않음
 * - admin: 관리자 주소 (소유권 이전 기능 없음)
 */
export interface LedgerMetadata {
  admin: Address;
  name: string;
  symbol: string;
  decimals: number;
}

/**
 * 한 번에 원자적으로 반영할 변경사항 묶음
 *
 * - Map에 없는 키는 "변경 없음"
 * - 잔액/허용량 0은 "키 삭제"와 같음 (없는 키 = 0)
 * - 스칼라 필드는 undefined면 변경 없음
 */
export interface LedgerChangeSet {
  balances: Map<Address, Amount>;
  allowances: Map<string, Amount>; // allowanceKey(owner, spender) → amount
  blacklist: Map<Address, boolean>;
  totalSupply?: Amount;
  paused?: boolean;
  metadata?: LedgerMetadata;
}

/**
 * 빈 변경사항 생성
 */
export function createChangeSet(): LedgerChangeSet {
  return {
    balances: new Map(),
    allowances: new Map(),
    blacklist: new Map(),
  };
}

/**
 * 변경사항이 비어 있는지 확인
 */
export function isEmptyChangeSet(changes: LedgerChangeSet): boolean {
  return (
    changes.balances.size === 0 &&
    changes.allowances.size === 0 &&
    changes.blacklist.size === 0 &&
    changes.totalSupply === undefined &&
    changes.paused === undefined &&
    changes.metadata === undefined
  );
}

/**
 * 허용량 키: "owner:spender"
 */
export function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}

/**
 * Ledger Repository Interface
 *
 * 역할:
 * - 원장 상태의 Key-Value 저장소
 * - 잔액, 허용량, 블랙리스트, 총 공급량, 일시 정지 플래그, 메타데이터
 *
 * 원자성:
 * - commit()은 변경사항 전체를 반영하거나 전혀 반영하지 않음
 * - 중간 상태(차감만 되고 입금은 안 된 상태)는 절대 보이지 않음
 */
export abstract class ILedgerRepository {
  /**
   * 저장소 열기 (여러 번 호출해도 안전)
   */
  abstract initialize(): Promise<void>;

  /**
   * 메타데이터 조회
   *
   * @returns 메타데이터, 아직 생성되지 않았으면 null
   */
  abstract getMetadata(): Promise<LedgerMetadata | null>;

  abstract getTotalSupply(): Promise<Amount>;

  abstract isPaused(): Promise<boolean>;

  /**
   * 잔액 조회 (없으면 0)
   */
  abstract getBalance(address: Address): Promise<Amount>;

  /**
   * 허용량 조회 (없으면 0)
   */
  abstract getAllowance(owner: Address, spender: Address): Promise<Amount>;

  abstract isBlacklisted(address: Address): Promise<boolean>;

  /**
   * 변경사항 일괄 반영 (원자적)
   */
  abstract commit(changes: LedgerChangeSet): Promise<void>;

  /**
   * 저장소 닫기
   */
  abstract close(): Promise<void>;
}
