/**
 * sensor-harvesterモジュールのメインエントリーポイント
 *
 * 外部からのインポート用エクスポート一覧
 */
import { harvest } from './harvester';
import { SentiloClient } from './api-client';
import { JsonArtifactWriter } from './io/file';
import { HarvestScheduler } from './scheduler';

// メインのharvest関数をエクスポート
export { harvest };

// APIクライアント
export { SentiloClient };

// 出力
export { JsonArtifactWriter };

// 定期実行
export { HarvestScheduler };

// コア処理
export { classify, createClassifier, normalizeDescription, toSeriesKind } from './classifier';
export { extractValue } from './value-extractor';
export { buildSeries } from './series-builder';
export { deriveSeries } from './derivation/engine';
export { parseDerivationExpression } from './derivation/parser';
export { assembleCatalogue, seriesLocation } from './catalogue';
export { loadConfig, parseConfig } from './config';
export { loadSensorSheet, parseSensorSheet } from './sensor-sheet';
export { readSeriesArtifact } from './io/file';

// 型定義をエクスポート
export * from './types/config';
export * from './types/series';
export * from './derivation/types';
export type { Catalogue, CatalogueEntry } from './catalogue';
export type { ObservationSource, FetchObservationsOptions } from './api-client';
export type { HarvestParams, HarvestResult, SensorFailure } from './harvester';
export type { SeriesArtifact, CatalogueArtifact, ArtifactWriter } from './io/file';

/**
 * メインモジュール情報
 */
export const VERSION = '0.1.0';
export const MODULE_NAME = 'sensor-harvester';
