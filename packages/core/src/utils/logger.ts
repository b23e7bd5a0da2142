/**
 * 콘솔 로거
 *
 * 코어는 debug 만 쓴다 (건너뛴 필드, 고아 노드, 패스 시간).
 * debug 는 DEBUG=true 또는 FIGJSON_DEBUG=true 일 때만 찍힌다.
 */

import { describeError } from './errors.js';

const ANSI = {
  reset: '\x1b[0m',
  blue: '\x1b[34m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
} as const;

type Tone = Exclude<keyof typeof ANSI, 'reset'>;

function tint(tone: Tone, text: string): string {
  return process.env['NO_COLOR'] === undefined ? `${ANSI[tone]}${text}${ANSI.reset}` : text;
}

export function isDebugEnabled(): boolean {
  return process.env['DEBUG'] === 'true' || process.env['FIGJSON_DEBUG'] === 'true';
}

export const logger = {
  info(msg: string): void {
    console.log(`${tint('blue', 'info')}  ${msg}`);
  },

  success(msg: string): void {
    console.log(`${tint('green', 'ok')}    ${msg}`);
  },

  warn(msg: string): void {
    console.warn(`${tint('yellow', 'warn')}  ${msg}`);
  },

  /** err 는 describeError 로 한 줄 더. debug 면 스택까지 */
  error(msg: string, err?: unknown): void {
    console.error(`${tint('red', 'error')} ${msg}`);
    if (err === undefined) return;
    console.error(tint('gray', `      ${describeError(err)}`));
    if (isDebugEnabled() && err instanceof Error && err.stack !== undefined) {
      console.error(tint('gray', err.stack));
    }
  },

  debug(msg: string): void {
    if (isDebugEnabled()) console.log(tint('gray', `[figjson] ${msg}`));
  },
};

// ─── 진행 표시 ───────────────────────────────────────────────────────────────

/** [2/5] ▕██████████░░░░░░░░░░▏ design.fig */
export interface Progress {
  tick(label: string): void;
  done(): void;
}

const BAR_WIDTH = 20;

/** 색 없는 막대. total 0 이면 가득 찬 막대 */
export function renderBar(current: number, total: number, width = BAR_WIDTH): string {
  const filled = total === 0 ? width : Math.min(width, Math.round((current / total) * width));
  return `▕${'█'.repeat(filled)}${'░'.repeat(width - filled)}▏`;
}

/**
 * 터미널이면 한 줄을 덮어쓰고, 아니면 (파이프, CI 로그) 파일마다 한 줄씩 쓴다.
 */
export function createProgress(total: number, stream: NodeJS.WriteStream = process.stdout): Progress {
  let current = 0;
  const inPlace = stream.isTTY === true;

  return {
    tick(label: string): void {
      current++;
      const line = `${tint('blue', `[${current}/${total}]`)} ${renderBar(current, total)} ${tint('gray', label)}`;
      stream.write(inPlace ? `\r${line}    ` : `${line}\n`);
    },
    done(): void {
      if (inPlace) stream.write('\n');
      logger.success(`${current}/${total}개 파일 처리`);
    },
  };
}
