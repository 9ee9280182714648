/**
 * 원장 전역 상수 정의
 */

/**
 * ZERO_ADDRESS: 널(null) 주소
 *
 * 용도:
 * - 어떤 계정도 될 수 없는 센티넬 값
 * - Transfer 이벤트에서 from = ZERO_ADDRESS 이면 발행(mint)
 * - Transfer 이벤트에서 to = ZERO_ADDRESS 이면 소각(burn)
 */
export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

/**
 * UINT256_MAX: 수량이 가질 수 있는 최댓값 (2^256 - 1)
 *
 * 잔액, 허용량(allowance), 총 공급량 모두 이 범위를 넘을 수 없음
 * 넘으면 ArithmeticOverflow
 */
export const UINT256_MAX = (1n << 256n) - 1n;

/**
 * 기본 토큰 메타데이터
 *
 * - decimals 6: 1 mUSD = 1,000,000 최소 단위
 */
export const DEFAULT_TOKEN_NAME = 'Mini Dollar';
export const DEFAULT_TOKEN_SYMBOL = 'mUSD';
export const DEFAULT_TOKEN_DECIMALS = 6;

/**
 * 기본 초기 발행량 (최소 단위)
 *
 * 1,000,000 최소 단위 = 1.000000 mUSD
 */
export const DEFAULT_INITIAL_SUPPLY = 1_000_000n;

/**
 * 기본 관리자 주소 (개발용)
 *
 * 실제 운영에서는 LEDGER_ADMIN 환경변수로 지정
 */
export const DEFAULT_ADMIN_ADDRESS =
  '0x1111111111111111111111111111111111111111';

/**
 * LevelDB 기본 경로
 */
export const DEFAULT_DB_PATH = 'data/ledger';

/**
 * 메모리 이벤트 로그에 보관하는 최대 이벤트 수
 */
export const DEFAULT_EVENT_LOG_LIMIT = 10_000;
