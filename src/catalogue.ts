/**
 * カタログ（インデックス）組み立てモジュール
 */
import { Series, SeriesKind } from './types/series';

export interface CatalogueEntry {
  description: string;
  unit: string;
  kind: SeriesKind;
  /** 出力ファイル名（センサーIDから決定的に生成） */
  location: string;
}

export interface Catalogue {
  /** 生成時刻（ISO 8601形式、カタログ全体で1つ） */
  generatedAt: string;
  provider?: string;
  sensors: Record<string, CatalogueEntry>;
}

export interface AssembleOptions {
  generatedAt?: Date;
  provider?: string;
}

/**
 * センサーIDから出力ファイル名を生成
 * 同じIDは常に同じファイル名になり、異なるIDが衝突することはない
 * @param sensorId センサーID
 * @returns ファイル名
 */
export function seriesLocation(sensorId: string): string {
  return `${encodeURIComponent(sensorId)}.json`;
}

/**
 * 時系列のリストからカタログを組み立てる
 * 0点の時系列は含めない
 * @param seriesList 時系列のリスト
 * @param options 生成時刻・プロバイダ
 * @returns カタログ
 */
export function assembleCatalogue(seriesList: readonly Series[], options: AssembleOptions = {}): Catalogue {
  const sensors: Record<string, CatalogueEntry> = {};

  for (const series of seriesList) {
    if (series.samples.length === 0) {
      continue;
    }
    sensors[series.sensorId] = {
      description: series.description,
      unit: series.unit,
      kind: series.kind,
      location: seriesLocation(series.sensorId)
    };
  }

  const catalogue: Catalogue = {
    generatedAt: (options.generatedAt ?? new Date()).toISOString(),
    sensors
  };
  if (options.provider) {
    catalogue.provider = options.provider;
  }
  return catalogue;
}
