/**
 * 타임스탬프 유틸리티
 */

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * 타임존 정보가 포함된 타임스탬프 생성
 * ISO 8601 형식 (예: 2025-10-30T12:34:56.789+07:00)
 *
 * - 시스템 로컬 타임존 기준 (TZ 환경 변수)
 * - 밀리초 단위까지 기록
 */
export function getTimestampWithTimezone(date: Date = new Date()): string {
  const offset = -date.getTimezoneOffset();
  const offsetSign = offset >= 0 ? "+" : "-";
  const offsetHours = pad(Math.floor(Math.abs(offset) / 60));
  const offsetMinutes = pad(Math.abs(offset) % 60);

  return (
    `${getDateStringWithDash(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:` +
    `${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}` +
    `${offsetSign}${offsetHours}:${offsetMinutes}`
  );
}

/**
 * YYYY-MM-DD 형식의 날짜 문자열 (로컬 타임존 기준)
 */
export function getDateStringWithDash(date: Date = new Date()): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
