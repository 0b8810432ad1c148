/**
 * 観測値ペイロードから数値を取り出すモジュール
 *
 * Sentiloの観測値は次のようなJSON文字列で届く:
 *   {"summary": {"firstvalue": 1520.4, "lastvalue": 1523.1, "avg": 12.5, ...}}
 */
import { ObservationKind } from './types/series';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 数値または数値文字列を有限の数値に変換
 * @param value 変換対象
 * @returns 数値、変換できない場合はnull
 */
export function toFiniteNumber(value: unknown): number | null {
  let parsed: number;

  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!NUMERIC_PATTERN.test(trimmed)) {
      return null;
    }
    parsed = Number(trimmed);
  } else {
    return null;
  }

  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * ペイロードを解析して summary オブジェクトを取り出す
 * @param rawPayload 生のペイロード文字列
 * @returns summary、取り出せない場合はnull
 */
export function parseSummary(rawPayload: string | null | undefined): JsonObject | null {
  if (!rawPayload) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(rawPayload);
  } catch {
    return null;
  }

  if (!isJsonObject(data) || !isJsonObject(data.summary)) {
    return null;
  }
  return data.summary;
}

/**
 * 観測値の種別に応じて1つの数値を取り出す
 * - energy: lastvalue - firstvalue（平均値へのフォールバックはしない）
 * - instantaneous: avg
 *
 * @param kind 観測値の種別
 * @param rawPayload 生のペイロード文字列
 * @returns 数値、使えない観測値の場合はnull
 */
export function extractValue(kind: ObservationKind, rawPayload: string | null | undefined): number | null {
  const summary = parseSummary(rawPayload);
  if (!summary) {
    return null;
  }

  if (kind === 'energy') {
    const first = toFiniteNumber(summary.firstvalue);
    const last = toFiniteNumber(summary.lastvalue);
    if (first === null || last === null) {
      return null;
    }
    const delta = last - first;
    return Number.isFinite(delta) ? delta : null;
  }

  return toFiniteNumber(summary.avg);
}
