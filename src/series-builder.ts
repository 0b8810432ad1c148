/**
 * 時系列構築モジュール
 * 生の観測値リストからセンサー1本分の時系列を組み立てる
 */
import { Classifier, createClassifier, toSeriesKind } from './classifier';
import { extractValue } from './value-extractor';
import { normalizeTimestamp, compareTimestamps } from './utils/time-utils';
import { RawObservation, Sample, SensorDescriptor, Series } from './types/series';

/**
 * 観測値リストから時系列を構築する
 *
 * - 種別の判定はセンサー単位で1回だけ行う
 * - 値を取り出せない観測値、タイムスタンプ/ペイロードが空の観測値は捨てる
 * - 取得順に依存せず、常にタイムスタンプ昇順に並べ替える
 * - 同一タイムスタンプは後から届いた方を採用する
 *
 * @param descriptor センサー情報
 * @param observations 生の観測値
 * @param classifier 分類関数
 * @returns 時系列（0点の場合もある）
 */
export function buildSeries(
  descriptor: SensorDescriptor,
  observations: readonly RawObservation[],
  classifier: Classifier = createClassifier()
): Series {
  const kind = classifier(descriptor.id, descriptor.description);
  const samples: Sample[] = [];

  for (const observation of observations) {
    const { timestamp, rawPayload } = observation;
    if (!timestamp || !rawPayload) {
      continue;
    }

    const value = extractValue(kind, rawPayload);
    if (value === null) {
      continue;
    }

    samples.push({
      timestamp: normalizeTimestamp(timestamp) ?? timestamp,
      value
    });
  }

  return {
    sensorId: descriptor.id,
    description: descriptor.description,
    unit: descriptor.unit,
    kind: toSeriesKind(kind),
    samples: sortAndDeduplicate(samples)
  };
}

/**
 * 昇順に並べ替え、同一タイムスタンプは最後のものを残す
 * Array.prototype.sort は安定ソートのため、同値内の元の順序は保たれる
 */
export function sortAndDeduplicate(samples: readonly Sample[]): Sample[] {
  const sorted = [...samples].sort((a, b) => compareTimestamps(a.timestamp, b.timestamp));
  const result: Sample[] = [];

  for (const sample of sorted) {
    const last = result[result.length - 1];
    if (last && last.timestamp === sample.timestamp) {
      result[result.length - 1] = sample;
    } else {
      result.push(sample);
    }
  }

  return result;
}
