/**
 * 단위 변환 유틸리티
 *
 * 원장 내부는 항상 최소 단위(bigint)로 계산하고,
 * 사람이 읽는 값(예: "1.5")은 표시할 때만 decimals 기준으로 변환
 *
 * 예 (decimals = 6):
 * - 1 mUSD = 1,000,000 최소 단위
 * - 100000n → "0.1"
 */

/**
 * 최소 단위 → 표시 단위 (뒤의 0 제거)
 *
 * @example
 * formatUnits(1500000n, 6) // "1.5"
 * formatUnits(100000n, 6) // "0.1"
 * formatUnits(2000000n, 6) // "2"
 */
export function formatUnits(amount: bigint, decimals: number): string {
  if (decimals === 0) {
    return amount.toString();
  }

  const padded = amount.toString().padStart(decimals + 1, '0');
  const integerPart = padded.slice(0, -decimals);
  const decimalPart = padded.slice(-decimals).replace(/0+$/, '');

  if (decimalPart === '') {
    return integerPart;
  }

  return `${integerPart}.${decimalPart}`;
}

/**
 * 금액 포맷팅 (심볼 포함)
 *
 * @example
 * formatAmount(1500000n, 6, 'mUSD') // "1.5 mUSD"
 */
export function formatAmount(
  amount: bigint,
  decimals: number,
  symbol: string,
): string {
  return `${formatUnits(amount, decimals)} ${symbol}`;
}
