/**
 * 원장 전체에서 사용되는 공통 타입 정의
 * 이더리움 주소 형식을 그대로 따름
 */

/**
 * Address: 계정 식별자
 *
 * 형식:
 * - "0x" 접두사 + 40 hex chars (20바이트)
 * - 대소문자 구분 안함 (저장 시 소문자로 정규화)
 *
 * 특수 값:
 * - ZERO_ADDRESS (0x000...000)는 어떤 계정도 될 수 없음
 * - 발행(mint)/소각(burn) 이벤트의 from/to로만 사용됨
 */
export type Address = string; // "0x" + 40 hex characters

/**
 * Amount: 토큰 수량 (최소 단위)
 *
 * - 256비트 부호 없는 정수 (0 ~ 2^256 - 1)
 * - bigint로 처리 (Number.MAX_SAFE_INTEGER 한계 극복)
 */
export type Amount = bigint;

/**
 * HEX 문자열에서 "0x" 접두사 제거
 */
export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex.slice(2) : hex;
}

/**
 * HEX 문자열 형식 검증
 *
 * @param value - 검증할 문자열
 * @param byteLength - 예상되는 바이트 길이 (선택, 예: 20 = 40 hex chars)
 */
export function isHexString(value: string, byteLength?: number): boolean {
  if (!value || typeof value !== 'string') {
    return false;
  }

  if (!/^0x[0-9a-fA-F]*$/.test(value)) {
    return false;
  }

  const hex = stripHexPrefix(value);

  // 홀수 길이 hex는 무효
  if (hex.length % 2 !== 0) {
    return false;
  }

  if (byteLength !== undefined && hex.length !== byteLength * 2) {
    return false;
  }

  return true;
}

/**
 * 주소 검증 함수
 *
 * - 정확히 20바이트 (40 hex chars)
 * - 0x 접두사 필수
 * - ZERO_ADDRESS도 형식상으로는 유효함 (Guard에서 따로 거름)
 */
export function isValidAddress(address: string): boolean {
  return isHexString(address, 20);
}

/**
 * 주소 정규화 (소문자)
 *
 * 저장소 키, 블랙리스트 비교 등은 모두 정규화된 주소로 수행
 *
 * @throws {Error} 주소 형식이 아닌 경우
 */
export function normalizeAddress(address: string): Address {
  if (!isValidAddress(address)) {
    throw new Error(`Invalid address: ${address}`);
  }
  return address.toLowerCase();
}
