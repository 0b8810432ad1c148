/**
 * ファイル操作モジュール
 * 時系列ファイル・インデックスファイルの読み書きを提供
 */
import * as fs from 'fs';
import * as path from 'path';
import { Catalogue, seriesLocation } from '../catalogue';
import { Series, SeriesKind } from '../types/series';

/**
 * センサー1本分の出力ファイル形式
 * labels と values は同じ長さで、添字が対応する（昇順）
 */
export interface SeriesArtifact {
  sensor_id: string;
  description: string;
  unit: string;
  tipo_dato: SeriesKind;
  labels: string[];
  values: number[];
}

/**
 * インデックスファイル形式
 */
export interface CatalogueArtifact {
  generado: string;
  provider?: string;
  sensores: Record<string, {
    descripcion: string;
    unidad: string;
    tipo_dato: SeriesKind;
    archivo: string;
  }>;
}

/**
 * 時系列を出力ファイル形式に変換
 */
export function toSeriesArtifact(series: Series): SeriesArtifact {
  return {
    sensor_id: series.sensorId,
    description: series.description,
    unit: series.unit,
    tipo_dato: series.kind,
    labels: series.samples.map(sample => sample.timestamp),
    values: series.samples.map(sample => sample.value)
  };
}

/**
 * カタログをインデックスファイル形式に変換
 */
export function toCatalogueArtifact(catalogue: Catalogue): CatalogueArtifact {
  const artifact: CatalogueArtifact = {
    generado: catalogue.generatedAt,
    sensores: {}
  };
  if (catalogue.provider) {
    artifact.provider = catalogue.provider;
  }

  for (const [sensorId, entry] of Object.entries(catalogue.sensors)) {
    artifact.sensores[sensorId] = {
      descripcion: entry.description,
      unidad: entry.unit,
      tipo_dato: entry.kind,
      archivo: entry.location
    };
  }
  return artifact;
}

/**
 * 出力ファイルの書き込み先
 */
export interface ArtifactWriter {
  writeSeries(series: Series): string;
  writeCatalogue(catalogue: Catalogue): string;
}

/**
 * JSONファイルへの出力サービス
 */
export class JsonArtifactWriter implements ArtifactWriter {
  /**
   * @param outputDirectory 時系列ファイルの出力ディレクトリ
   * @param indexFile インデックスファイルのパス
   */
  constructor(private outputDirectory: string, private indexFile: string) {
    console.log(`📁 Series output path: ${this.outputDirectory}`);
    console.log(`📄 Index file: ${this.indexFile}`);
  }

  /**
   * 時系列ファイルを書き込む
   * @param series 時系列
   * @returns 書き込んだファイルのパス
   */
  writeSeries(series: Series): string {
    const outputPath = path.join(this.outputDirectory, seriesLocation(series.sensorId));
    writeJsonAtomically(outputPath, toSeriesArtifact(series));
    return outputPath;
  }

  /**
   * インデックスファイルを書き込む（毎回全体を作り直す）
   * @param catalogue カタログ
   * @returns 書き込んだファイルのパス
   */
  writeCatalogue(catalogue: Catalogue): string {
    writeJsonAtomically(this.indexFile, toCatalogueArtifact(catalogue));
    return this.indexFile;
  }

  /**
   * 出力ディレクトリの情報を取得
   */
  getOutputDirectoryInfo(): { path: string; exists: boolean; writable: boolean } {
    const exists = fs.existsSync(this.outputDirectory);
    let writable = false;

    if (exists) {
      // 書き込み可能性をテスト
      const testFile = path.join(this.outputDirectory, '.write_test');
      try {
        fs.writeFileSync(testFile, 'test');
        fs.unlinkSync(testFile);
        writable = true;
      } catch (error) {
        console.warn(`Output directory is not writable: ${this.outputDirectory} (${error instanceof Error ? error.message : String(error)})`);
      }
    }

    return { path: this.outputDirectory, exists, writable };
  }

  /**
   * 出力ディレクトリを作成し、書き込めることを確認する（起動時に1回）
   * @throws 書き込めない場合
   */
  ensureOutputDirectory(): void {
    if (!fs.existsSync(this.outputDirectory)) {
      fs.mkdirSync(this.outputDirectory, { recursive: true });
    }

    const outputInfo = this.getOutputDirectoryInfo();
    console.log(`Output directory: ${outputInfo.path} (exists: ${outputInfo.exists}, writable: ${outputInfo.writable})`);

    if (!outputInfo.writable) {
      throw new Error(`出力ディレクトリに書き込めません: ${outputInfo.path}`);
    }
  }
}

/**
 * JSONを一時ファイルに書き込んでからアトミックにrenameする
 * @param filePath 出力先
 * @param data 書き込むデータ
 */
export function writeJsonAtomically(filePath: string, data: unknown): void {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    // 書きかけの一時ファイルを残さない
    fs.rmSync(tempPath, { force: true });
    throw new Error(`ファイル書き込みエラー (${filePath}): ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * 時系列ファイルを読み込んで時系列に戻す
 * @param filePath 時系列ファイルのパス
 * @returns 時系列
 * @throws 形式が正しくない場合
 */
export function readSeriesArtifact(filePath: string): Series {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));

  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`時系列ファイルの形式が正しくありません: ${filePath}`);
  }

  const sensorId = 'sensor_id' in parsed ? parsed.sensor_id : undefined;
  const description = 'description' in parsed ? parsed.description : undefined;
  const unit = 'unit' in parsed ? parsed.unit : undefined;
  const kind = 'tipo_dato' in parsed ? parsed.tipo_dato : undefined;
  const labels = 'labels' in parsed ? parsed.labels : undefined;
  const values = 'values' in parsed ? parsed.values : undefined;

  if (typeof sensorId !== 'string' ||
      typeof description !== 'string' ||
      typeof unit !== 'string' ||
      (kind !== 'interval_consumption' && kind !== 'instantaneous') ||
      !isStringArray(labels) ||
      !isNumberArray(values) ||
      labels.length !== values.length) {
    throw new Error(`時系列ファイルの形式が正しくありません: ${filePath}`);
  }

  return {
    sensorId,
    description,
    unit,
    kind,
    samples: labels.map((timestamp, index) => ({ timestamp, value: values[index] }))
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number' && Number.isFinite(item));
}
