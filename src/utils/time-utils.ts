/**
 * 時刻処理ユーティリティ
 */
import { AlignmentGranularity } from '../derivation/types';

const SENTILO_TIMESTAMP = /^(\d{1,2})\/(\d{1,2})\/(\d{4})T(\d{1,2}):(\d{1,2}):(\d{1,2})$/;
const ISO_MINUTE_PREFIX = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2})(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Sentilo形式のタイムスタンプをISO 8601形式に変換
 * @param timestamp dd/MM/yyyyTHH:mm:ss形式の文字列（例: "13/08/2025T07:45:01"、ゼロ埋めなしも可）
 * @returns yyyy-MM-ddTHH:mm:ss形式の文字列、変換できない場合はnull
 */
export function normalizeTimestamp(timestamp: string): string | null {
  const match = SENTILO_TIMESTAMP.exec(timestamp.trim());
  if (!match) {
    return null;
  }

  const [, dd, mm, yyyy, hh, mi, ss] = match;
  const year = parseInt(yyyy, 10);
  const month = parseInt(mm, 10);
  const day = parseInt(dd, 10);
  const hour = parseInt(hh, 10);
  const minute = parseInt(mi, 10);
  const second = parseInt(ss, 10);

  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  // 実際の日付として有効かチェック（31/02 など）
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day) {
    return null;
  }

  return `${yyyy}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * タイムスタンプを分単位に切り捨てる（秒=00）
 * @param timestamp ISO 8601形式の文字列
 * @returns 切り捨て後の文字列、ISO形式でない場合は元の文字列
 */
export function truncateToMinute(timestamp: string): string {
  const match = ISO_MINUTE_PREFIX.exec(timestamp);
  if (!match) {
    return timestamp;
  }
  return `${match[1]}:00${match[2] ?? ''}`;
}

/**
 * 派生計算用の位置合わせキーを生成
 * @param timestamp タイムスタンプ
 * @param granularity 粒度
 * @returns 位置合わせキー
 */
export function toAlignmentKey(timestamp: string, granularity: AlignmentGranularity): string {
  return granularity === 'minute' ? truncateToMinute(timestamp) : timestamp;
}

/**
 * タイムスタンプ文字列の昇順比較（ロケール非依存）
 */
export function compareTimestamps(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
