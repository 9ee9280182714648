/**
 * DTO 공통 검증 패턴
 */

// 0x + 40 hex (이더리움 주소 형식, ZERO_ADDRESS 포함)
export const ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/;
export const ADDRESS_MESSAGE =
  'must be a valid address (0x + 40 hex characters)';

// 0 이상의 10진수 정수 문자열 (최소 단위)
export const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;
export const AMOUNT_MESSAGE = 'must be a non-negative integer string';

export const EXAMPLE_ADDRESS = '0x1234567890123456789012345678901234567890';
