/**
 * Harvesterモジュール
 * 取得・正規化・派生計算・カタログ出力の一連の処理を行う
 */
import { HarvesterConfig } from './types/config';
import { Series, SensorDefinition } from './types/series';
import { ObservationSource } from './api-client';
import { ArtifactWriter } from './io/file';
import { buildSeries } from './series-builder';
import { createClassifier } from './classifier';
import { deriveSeries, orderDerivedSpecs } from './derivation/engine';
import { expressionToString, parseDerivationExpression } from './derivation/parser';
import { assembleCatalogue, Catalogue } from './catalogue';
import { getClassificationRules, getDerivationOptions } from './config';

/**
 * Harvesterの入力パラメータ
 */
export interface HarvestParams {
  config: HarvesterConfig;
  sensors: SensorDefinition[];
  source: ObservationSource;
  /** 省略時はファイル出力を行わない */
  writer?: ArtifactWriter;
  /** カタログの生成時刻（テスト用） */
  now?: () => Date;
}

/**
 * センサー単位の失敗
 */
export interface SensorFailure {
  sensorId: string;
  stage: 'fetch' | 'derive' | 'write';
  message: string;
}

/**
 * Harvesterの実行結果
 */
export interface HarvestResult {
  success: boolean;
  catalogue: Catalogue;
  /** 構築・計算したすべての時系列（0点を含む） */
  series: Series[];
  outputFiles: string[];
  failures: SensorFailure[];
  error?: Error;
  stats: {
    fetched: number;
    derived: number;
    empty: number;
    duration: number;
  };
}

/**
 * コアロジック：センサーごとの取得・正規化、計算センサーの派生、カタログ出力
 *
 * 1センサーの失敗は記録して次のセンサーへ進む。
 * 計算センサーはすべての取得が終わってから、構築済み時系列の読み取り専用スナップショットで計算する。
 *
 * @param params 実行パラメータ
 * @returns 実行結果
 */
export async function harvest(params: HarvestParams): Promise<HarvestResult> {
  const { config, source, writer } = params;
  const startTime = Date.now();
  const classifier = createClassifier(getClassificationRules(config));
  const derivedIds = new Set(config.derived.map(spec => spec.sensorId));
  const failures: SensorFailure[] = [];
  const built = new Map<string, Series>();
  const stats = { fetched: 0, derived: 0, empty: 0, duration: 0 };

  const sensors = filterIncluded(params.sensors, config.sensors.include);
  console.log(`🚀 Harvesting ${sensors.length} sensor(s)`);

  // 1) 実センサーの取得・正規化
  for (const sensor of sensors) {
    const { descriptor, route } = sensor;

    if (derivedIds.has(descriptor.id)) {
      console.log(`\n📡 ${descriptor.id} – ${descriptor.description} (calculated)`);
      continue;
    }
    if (route.calculated) {
      console.warn(`\n📡 ${descriptor.id} – ${descriptor.description}`);
      console.warn('   ⚠️  Marked as calculated but no derived rule is configured, skipping');
      continue;
    }

    console.log(`\n📡 ${descriptor.id} – ${descriptor.description}`);

    const kind = classifier(descriptor.id, descriptor.description);
    const limit = kind === 'energy' ? config.sentilo_api.limit : config.sentilo_api.limit_instant;

    let series: Series;
    try {
      const observations = await source.fetchObservations(sensor, { limit });
      series = buildSeries(descriptor, observations, classifier);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`   ❌ ${message}`);
      failures.push({ sensorId: descriptor.id, stage: 'fetch', message });
      continue;
    }

    built.set(descriptor.id, series);
    stats.fetched++;

    if (series.samples.length === 0) {
      stats.empty++;
      console.warn('   ⚠️  No valid values');
    } else {
      console.log(`   ✅ OK (${series.samples.length} points)`);
    }
  }

  // 2) 計算センサー（依存関係順。先に計算した結果を後の計算で参照できる）
  const derivationOptions = getDerivationOptions(config);
  const derivedSpecs = orderDerivedSpecs(config.sensors.include.length === 0
    ? config.derived
    : config.derived.filter(spec => config.sensors.include.includes(spec.sensorId)));

  for (const spec of derivedSpecs) {
    console.log(`\n📡 ${spec.sensorId} – ${spec.description} (derived)`);

    try {
      console.log(`   🧮 ${expressionToString(parseDerivationExpression(spec.expression))}`);
      const snapshot: ReadonlyMap<string, Series> = new Map(built);
      const result = deriveSeries(spec, snapshot, derivationOptions);

      if (result.missingMandatory.length > 0) {
        const message = `missing base series: ${result.missingMandatory.join(', ')}`;
        console.error(`   ❌ Cannot derive, ${message}`);
        failures.push({ sensorId: spec.sensorId, stage: 'derive', message });
        continue;
      }
      for (const missing of result.missingOptional) {
        console.warn(`   ⚠️  ${missing} not available, assuming 0 at every point`);
      }

      built.set(spec.sensorId, result.series);
      stats.derived++;

      if (result.series.samples.length === 0) {
        stats.empty++;
        console.warn('   ⚠️  No aligned points');
      } else {
        console.log(`   ✅ OK (${result.series.samples.length} points)`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`   ❌ ${message}`);
      failures.push({ sensorId: spec.sensorId, stage: 'derive', message });
    }
  }

  // 3) カタログ組み立て・出力
  const series = Array.from(built.values());
  const catalogue = assembleCatalogue(series, {
    generatedAt: params.now ? params.now() : new Date(),
    provider: config.sentilo_api.default_provider
  });

  const outputFiles: string[] = [];
  let catalogueError: Error | undefined;

  if (writer) {
    for (const item of series) {
      if (item.samples.length === 0) {
        continue;
      }
      try {
        outputFiles.push(writer.writeSeries(item));
      } catch (writeError) {
        const message = writeError instanceof Error ? writeError.message : String(writeError);
        console.error(`❌ ${message}`);
        failures.push({ sensorId: item.sensorId, stage: 'write', message });
        delete catalogue.sensors[item.sensorId];
      }
    }

    try {
      outputFiles.push(writer.writeCatalogue(catalogue));
    } catch (writeError) {
      catalogueError = writeError instanceof Error ? writeError : new Error(String(writeError));
      console.error(`❌ ${catalogueError.message}`);
    }
  }

  stats.duration = Date.now() - startTime;
  console.log(`\n✅ Harvest finished: ${Object.keys(catalogue.sensors).length} series in catalogue, ${failures.length} failure(s)`);

  return {
    success: catalogueError === undefined,
    catalogue,
    series,
    outputFiles,
    failures,
    error: catalogueError,
    stats
  };
}

/**
 * 対象センサーを絞り込む（include が空の場合はすべて）
 */
function filterIncluded(sensors: SensorDefinition[], include: string[]): SensorDefinition[] {
  if (include.length === 0) {
    return sensors;
  }
  const allowed = new Set(include);
  return sensors.filter(sensor => allowed.has(sensor.descriptor.id));
}
