/**
 * figjson 터미널 출력
 * NO_COLOR 가 있거나 stdout 이 터미널이 아니면 색 없이 쓴다.
 */

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  faint: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
} as const;

type Tone = Exclude<keyof typeof ANSI, 'reset'>;

export function colorEnabled(): boolean {
  return process.env['NO_COLOR'] === undefined && process.stdout.isTTY === true;
}

function paint(tone: Tone, text: string, color = colorEnabled()): string {
  return color ? `${ANSI[tone]}${text}${ANSI.reset}` : text;
}

export const log = {
  success: (msg: string) => console.log(`${paint('green', '✔')} ${msg}`),
  warn: (msg: string) => console.warn(`${paint('yellow', '!')} ${msg}`),
  error: (msg: string) => console.error(`${paint('red', '✖')} ${msg}`),
  info: (msg: string) => console.log(`${paint('cyan', '·')} ${msg}`),
  /** 들여쓴 안내 한 줄 (다음 할 일, 사용법) */
  step: (msg: string) => console.log(`  ${paint('faint', '→')} ${msg}`),
  title: (msg: string) => console.log(`\n${paint('bold', msg)}`),
  /** inspect 보고서처럼 표시 없이 그대로 찍는 여러 줄 */
  report: (lines: readonly string[]) => {
    for (const line of lines) console.log(line);
  },
};

export interface SummaryCounts {
  done: number;
  total: number;
  warnings: number;
  errors: number;
}

/** 파일 3/4 변환 · 경고 2 · 실패 1 */
export function formatSummary(counts: SummaryCounts, color = colorEnabled()): string {
  const { done, total, warnings, errors } = counts;
  return [
    paint(done === total ? 'green' : 'yellow', `파일 ${done}/${total} 변환`, color),
    warnings > 0 ? paint('yellow', `경고 ${warnings}`, color) : `경고 0`,
    errors > 0 ? paint('red', `실패 ${errors}`, color) : `실패 0`,
  ].join(' · ');
}

export function printSummary(counts: SummaryCounts & { logFile?: string }): void {
  console.log('');
  console.log(formatSummary(counts));
  if (counts.errors > 0 && counts.logFile !== undefined) {
    console.log(paint('faint', `실패 내역: ${counts.logFile}`));
  }
}
