/**
 * 設定ファイル読み込み・解析モジュール
 */
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { HarvesterConfig } from './types/config';
import { ClassificationRules } from './classifier';
import {
  AlignmentGranularity,
  DerivationOptions,
  DerivedSeriesSpec,
  MissingOptionalPolicy,
  OperandSpec
} from './derivation/types';
import { parseDerivationExpression, extractOperandNames } from './derivation/parser';
import { orderDerivedSpecs } from './derivation/engine';

type RawObject = Record<string, unknown>;

const ALIGNMENTS: readonly AlignmentGranularity[] = ['minute', 'exact'];
const MISSING_OPTIONAL_POLICIES: readonly MissingOptionalPolicy[] = ['zero', 'drop'];
const ORDERS: readonly HarvesterConfig['sentilo_api']['order'][] = ['asc', 'desc'];

/**
 * デフォルト設定値
 */
export const defaultConfig: HarvesterConfig = {
  sentilo_api: {
    base_url: 'http://connectaapi.bcn.cat',
    timeout: 30000,
    default_provider: 'SIGE_PR_0190',
    default_token_env: 'SENTILO_TOKEN',
    limit: 250,
    limit_instant: 250,
    order: 'desc'
  },
  classification: {
    energy_prefixes: ['0190_MV_'],
    producer_ids: ['0524_MV_FVENERGIA'],
    description_tokens: ['energia', 'energy']
  },
  sensors: {
    file: './sensores.csv',
    separator: ',',
    include: []
  },
  derivation: {
    alignment: 'minute',
    missing_optional: 'zero'
  },
  derived: [],
  output: {
    directory: './datos_sensores',
    index_file: './indice_sensores.json'
  },
  schedule: {
    cron: '*/15 * * * *',
    timezone: 'Europe/Madrid'
  }
};

/**
 * 設定ファイルを読み込み、解析する
 * @param configPath 設定ファイルのパス（デフォルト: 環境変数 HARVESTER_CONFIG または './config.yaml'）
 * @returns 設定オブジェクト
 */
export async function loadConfig(configPath: string = process.env.HARVESTER_CONFIG || './config.yaml'): Promise<HarvesterConfig> {
  if (!fs.existsSync(configPath)) {
    console.warn(`⚠️  Config file ${configPath} not found. Using default settings.`);
    return parseConfig({});
  }

  try {
    const fileContent = await fs.promises.readFile(configPath, 'utf-8');
    const parsed: unknown = yaml.load(fileContent);
    return parseConfig(parsed ?? {});
  } catch (error) {
    throw new Error(`設定ファイルの読み込みに失敗しました (${configPath}): ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * YAMLから読み込んだ値をデフォルト設定とマージし、検証する
 * @param raw YAMLの読み込み結果
 * @param env パスを上書きする環境変数
 * @returns 設定オブジェクト
 * @throws 検証エラー
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): HarvesterConfig {
  if (!isObject(raw)) {
    throw new Error('設定ファイルのトップレベルはマッピングである必要があります');
  }

  const api = section(raw, 'sentilo_api');
  const classification = section(raw, 'classification');
  const sensors = section(raw, 'sensors');
  const derivation = section(raw, 'derivation');
  const output = section(raw, 'output');
  const schedule = section(raw, 'schedule');
  const defaults = defaultConfig;

  const config: HarvesterConfig = {
    sentilo_api: {
      base_url: stringOption(api, 'base_url', defaults.sentilo_api.base_url, 'sentilo_api'),
      timeout: positiveNumberOption(api, 'timeout', defaults.sentilo_api.timeout, 'sentilo_api'),
      default_provider: stringOption(api, 'default_provider', defaults.sentilo_api.default_provider, 'sentilo_api'),
      default_token_env: stringOption(api, 'default_token_env', defaults.sentilo_api.default_token_env, 'sentilo_api'),
      limit: positiveNumberOption(api, 'limit', defaults.sentilo_api.limit, 'sentilo_api'),
      limit_instant: positiveNumberOption(api, 'limit_instant', defaults.sentilo_api.limit_instant, 'sentilo_api'),
      order: enumOption(api, 'order', ORDERS, defaults.sentilo_api.order, 'sentilo_api')
    },
    classification: {
      energy_prefixes: stringListOption(classification, 'energy_prefixes', defaults.classification.energy_prefixes, 'classification'),
      producer_ids: stringListOption(classification, 'producer_ids', defaults.classification.producer_ids, 'classification'),
      description_tokens: stringListOption(classification, 'description_tokens', defaults.classification.description_tokens, 'classification')
    },
    sensors: {
      file: env.HARVESTER_SENSORS_FILE || stringOption(sensors, 'file', defaults.sensors.file, 'sensors'),
      separator: stringOption(sensors, 'separator', defaults.sensors.separator, 'sensors'),
      include: stringListOption(sensors, 'include', defaults.sensors.include, 'sensors')
    },
    derivation: {
      alignment: enumOption(derivation, 'alignment', ALIGNMENTS, defaults.derivation.alignment, 'derivation'),
      missing_optional: enumOption(derivation, 'missing_optional', MISSING_OPTIONAL_POLICIES, defaults.derivation.missing_optional, 'derivation')
    },
    derived: parseDerivedSpecs(raw.derived),
    output: {
      directory: env.HARVESTER_OUTPUT_DIR || stringOption(output, 'directory', defaults.output.directory, 'output'),
      index_file: env.HARVESTER_INDEX_FILE || stringOption(output, 'index_file', defaults.output.index_file, 'output')
    },
    schedule: {
      cron: stringOption(schedule, 'cron', defaults.schedule.cron, 'schedule'),
      timezone: stringOption(schedule, 'timezone', defaults.schedule.timezone, 'schedule')
    }
  };

  validateConfig(config);
  // 計算センサーは依存先の計算が終わってから計算する
  config.derived = orderDerivedSpecs(config.derived);
  return config;
}

/**
 * 設定の基本的な検証を行う
 * @param config 検証する設定
 * @throws 検証エラー
 */
function validateConfig(config: HarvesterConfig): void {
  if (!config.sentilo_api.base_url) {
    throw new Error('sentilo_api.base_url が指定されていません。');
  }

  if (config.sensors.separator.length !== 1) {
    throw new Error(`sensors.separator は1文字で指定してください: "${config.sensors.separator}"`);
  }

  if (!config.output.directory) {
    throw new Error('output.directory が指定されていません。');
  }

  if (!config.output.index_file) {
    throw new Error('output.index_file が指定されていません。');
  }

  const derivedIds = new Set<string>();
  for (const spec of config.derived) {
    if (derivedIds.has(spec.sensorId)) {
      throw new Error(`計算センサー "${spec.sensorId}" が重複して定義されています。`);
    }
    derivedIds.add(spec.sensorId);
  }
}

/**
 * 計算センサー定義のリストを解析
 * @param raw derived セクションの値
 * @returns 計算センサー定義
 */
function parseDerivedSpecs(raw: unknown): DerivedSeriesSpec[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new Error('derived はリストで指定してください。');
  }
  return raw.map((item, index) => parseDerivedSpec(item, index));
}

function parseDerivedSpec(raw: unknown, index: number): DerivedSeriesSpec {
  const path = `derived[${index}]`;
  if (!isObject(raw)) {
    throw new Error(`${path} はマッピングで指定してください。`);
  }

  const sensorId = stringOption(raw, 'sensor_id', '', path);
  if (!sensorId) {
    throw new Error(`${path} に sensor_id が指定されていません。`);
  }

  const expression = stringOption(raw, 'expression', '', path);
  if (!expression) {
    throw new Error(`計算センサー "${sensorId}" に expression が指定されていません。`);
  }

  const operands = parseOperands(raw.operands, sensorId);

  let referenced: string[];
  try {
    referenced = extractOperandNames(parseDerivationExpression(expression));
  } catch (error) {
    throw new Error(`計算センサー "${sensorId}" の計算式が不正です: ${error instanceof Error ? error.message : String(error)}`);
  }

  const undeclared = referenced.filter(name => !(name in operands));
  if (undeclared.length > 0) {
    throw new Error(`計算センサー "${sensorId}" の計算式に未定義のオペランドがあります: ${undeclared.join(', ')}`);
  }

  const unused = Object.keys(operands).filter(name => !referenced.includes(name));
  if (unused.length > 0) {
    console.warn(`⚠️  Derived sensor ${sensorId}: operands not used by the expression: ${unused.join(', ')}`);
  }

  if (!Object.values(operands).some(operand => !operand.optional)) {
    throw new Error(`計算センサー "${sensorId}" には必須オペランドが少なくとも1つ必要です。`);
  }

  const spec: DerivedSeriesSpec = {
    sensorId,
    description: stringOption(raw, 'description', sensorId, path),
    unit: stringOption(raw, 'unit', '', path),
    expression,
    operands
  };

  if (raw.alignment !== undefined) {
    spec.alignment = enumOption(raw, 'alignment', ALIGNMENTS, 'minute', path);
  }
  if (raw.missing_optional !== undefined) {
    spec.missingOptional = enumOption(raw, 'missing_optional', MISSING_OPTIONAL_POLICIES, 'zero', path);
  }

  return spec;
}

/**
 * オペランド定義を解析
 * 値はセンサーIDの文字列、または { sensor_id, optional } のマッピング
 */
function parseOperands(raw: unknown, sensorId: string): Record<string, OperandSpec> {
  if (!isObject(raw) || Object.keys(raw).length === 0) {
    throw new Error(`計算センサー "${sensorId}" に operands が指定されていません。`);
  }

  const operands: Record<string, OperandSpec> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      throw new Error(`計算センサー "${sensorId}" のオペランド名が不正です: ${name}`);
    }

    if (typeof value === 'string' && value.trim()) {
      operands[name] = { sensorId: value.trim(), optional: false };
    } else if (isObject(value)) {
      const operandSensorId = stringOption(value, 'sensor_id', '', `${sensorId}.operands.${name}`);
      if (!operandSensorId) {
        throw new Error(`計算センサー "${sensorId}" のオペランド "${name}" に sensor_id が指定されていません。`);
      }
      operands[name] = { sensorId: operandSensorId, optional: value.optional === true };
    } else {
      throw new Error(`計算センサー "${sensorId}" のオペランド "${name}" の形式が正しくありません。`);
    }
  }
  return operands;
}

/**
 * 分類ルールを設定から取得
 */
export function getClassificationRules(config: HarvesterConfig): ClassificationRules {
  return {
    energyPrefixes: config.classification.energy_prefixes,
    producerIds: config.classification.producer_ids,
    descriptionTokens: config.classification.description_tokens
  };
}

/**
 * 派生計算の既定オプションを設定から取得
 */
export function getDerivationOptions(config: HarvesterConfig): DerivationOptions {
  return {
    alignment: config.derivation.alignment,
    missingOptional: config.derivation.missing_optional
  };
}

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string): RawObject {
  const value = raw[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isObject(value)) {
    throw new Error(`${key} はマッピングで指定してください。`);
  }
  return value;
}

function stringOption(obj: RawObject, key: string, fallback: string, path: string): string {
  const value = obj[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string') {
    throw new Error(`${path}.${key} は文字列で指定してください。`);
  }
  return value.trim();
}

function positiveNumberOption(obj: RawObject, key: string, fallback: number, path: string): number {
  const value = obj[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${path}.${key} は正の数値で指定してください。`);
  }
  return value;
}

function stringListOption(obj: RawObject, key: string, fallback: string[], path: string): string[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [...fallback];
  }
  if (!Array.isArray(value)) {
    throw new Error(`${path}.${key} はリストで指定してください。`);
  }
  return value.map(item => {
    if (typeof item !== 'string' && typeof item !== 'number') {
      throw new Error(`${path}.${key} の要素は文字列で指定してください。`);
    }
    return String(item).trim();
  });
}

function enumOption<T extends string>(obj: RawObject, key: string, allowed: readonly T[], fallback: T, path: string): T {
  const value = obj[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  const matched = allowed.find(candidate => candidate === value);
  if (matched === undefined) {
    throw new Error(`${path}.${key} は ${allowed.join(' / ')} のいずれかで指定してください: ${String(value)}`);
  }
  return matched;
}
