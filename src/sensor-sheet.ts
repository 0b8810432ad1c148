/**
 * センサー定義シート読み込みモジュール
 *
 * スプレッドシート（CSVエクスポート）の各行をセンサー定義に変換し、
 * 取得先プロバイダとトークン環境変数をここで一度だけ解決する。
 */
import * as fs from 'fs';
import { Readable } from 'stream';
import csvParser from 'csv-parser';
import { SensorDefinition } from './types/series';

export interface SheetOptions {
  separator: string;
  defaultProvider: string;
  defaultTokenEnv: string;
}

/**
 * 列名の候補（先に見つかったものを採用）
 */
const COLUMN_ALIASES = {
  sensorId: ['sensor_id'],
  description: ['descripcion'],
  unit: ['unitat de mesura', 'unidad'],
  dataType: ['tipus de dada', 'tipo_dato'],
  provider: ['provider_id'],
  tokenEnv: ['token_env']
} as const;

type ColumnKey = keyof typeof COLUMN_ALIASES;

/**
 * センサー定義シートを読み込む
 * @param filePath CSVファイルのパス
 * @param options 区切り文字・既定のプロバイダ/トークン環境変数
 * @returns センサー定義のリスト
 * @throws sensor_id 列が存在しない場合
 */
export async function loadSensorSheet(filePath: string, options: SheetOptions): Promise<SensorDefinition[]> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`センサー定義シートが見つかりません: ${filePath}`);
  }

  const content = await fs.promises.readFile(filePath);
  const definitions = await parseSensorSheet(content, options);
  console.log(`📋 Loaded ${definitions.length} sensor definition(s) from ${filePath}`);
  return definitions;
}

/**
 * CSVの内容をセンサー定義に変換する
 * @param content CSVの内容
 * @param options 区切り文字・既定のプロバイダ/トークン環境変数
 * @returns センサー定義のリスト
 */
export async function parseSensorSheet(content: Buffer | string, options: SheetOptions): Promise<SensorDefinition[]> {
  const rows: Record<string, string>[] = [];
  const headers: string[] = [];

  const stream = Readable.from(content).pipe(
    csvParser({
      separator: options.separator,
      mapHeaders: ({ header }) => header.trim().toLowerCase()
    })
  );
  stream.on('headers', (parsedHeaders: string[]) => {
    headers.push(...parsedHeaders);
  });

  for await (const row of stream) {
    if (isStringRecord(row)) {
      rows.push(row);
    }
  }

  const columns = resolveColumns(headers);
  const sensorIdColumn = columns.sensorId;
  if (!sensorIdColumn) {
    throw new Error(`センサー定義シートに sensor_id 列がありません。列: ${headers.join(', ')}`);
  }

  const definitions: SensorDefinition[] = [];
  const seen = new Set<string>();

  for (const row of rows) {
    const sensorId = cell(row, sensorIdColumn);
    if (!sensorId) {
      continue;
    }

    // tipo_dato 列がある場合は JSON のみ対象
    if (columns.dataType && cell(row, columns.dataType).toUpperCase() !== 'JSON') {
      continue;
    }

    if (seen.has(sensorId)) {
      console.warn(`⚠️  Duplicate sensor_id ${sensorId} in sheet, keeping the first row`);
      continue;
    }
    seen.add(sensorId);

    const provider = columns.provider ? cell(row, columns.provider) : '';
    const tokenEnv = columns.tokenEnv ? cell(row, columns.tokenEnv) : '';

    definitions.push({
      descriptor: {
        id: sensorId,
        description: (columns.description && cell(row, columns.description)) || sensorId,
        unit: columns.unit ? cell(row, columns.unit) : ''
      },
      route: {
        providerId: provider || options.defaultProvider,
        tokenEnv: tokenEnv || options.defaultTokenEnv,
        // provider_id と token_env が両方空の行は計算センサー
        calculated: Boolean(columns.provider && columns.tokenEnv && !provider && !tokenEnv)
      }
    });
  }

  return definitions;
}

/**
 * 列名の候補から実際の列名を解決
 */
function resolveColumns(headers: string[]): Record<ColumnKey, string | undefined> {
  const find = (aliases: readonly string[]): string | undefined =>
    aliases.find(alias => headers.includes(alias));

  return {
    sensorId: find(COLUMN_ALIASES.sensorId),
    description: find(COLUMN_ALIASES.description),
    unit: find(COLUMN_ALIASES.unit),
    dataType: find(COLUMN_ALIASES.dataType),
    provider: find(COLUMN_ALIASES.provider),
    tokenEnv: find(COLUMN_ALIASES.tokenEnv)
  };
}

/**
 * セルの値を取得（空・"nan" は空文字として扱う）
 */
function cell(row: Record<string, string>, column: string): string {
  const value = (row[column] ?? '').trim();
  return value.toLowerCase() === 'nan' ? '' : value;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null &&
    Object.values(value).every(item => typeof item === 'string');
}
