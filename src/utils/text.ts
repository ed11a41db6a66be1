/**
 * 코드 포인트 단위로 자르기 (이모지 등 서로게이트 쌍을 반으로 자르지 않음)
 */
export function truncateText(text: string, maxChars: number): string {
  const chars = Array.from(text);
  return chars.length <= maxChars ? text : chars.slice(0, maxChars).join('');
}
