/**
 * 設定ファイルの型定義
 */
import { AlignmentGranularity, DerivedSeriesSpec, MissingOptionalPolicy } from '../derivation/types';

export interface HarvesterConfig {
  sentilo_api: SentiloApiConfig;
  classification: ClassificationConfig;
  sensors: SensorsConfig;
  derivation: DerivationConfig;
  derived: DerivedSeriesSpec[];
  output: OutputConfig;
  schedule: ScheduleConfig;
}

export interface SentiloApiConfig {
  base_url: string;
  timeout: number;
  default_provider: string;
  default_token_env: string;
  /** エネルギー系センサーの取得件数 */
  limit: number;
  /** 瞬時値センサーの取得件数 */
  limit_instant: number;
  order: 'asc' | 'desc';
}

export interface ClassificationConfig {
  /** カウンタ系のセンサーIDプレフィックス */
  energy_prefixes: string[];
  /** 発電カウンタなど、個別に指定するエネルギー系センサーID */
  producer_ids: string[];
  /** 説明文に含まれていればエネルギー系と判定する語 */
  description_tokens: string[];
}

export interface SensorsConfig {
  /** センサー定義シート（CSV）のパス */
  file: string;
  separator: string;
  /** 空でない場合、このIDのみを処理する */
  include: string[];
}

export interface DerivationConfig {
  alignment: AlignmentGranularity;
  missing_optional: MissingOptionalPolicy;
}

export interface OutputConfig {
  directory: string;
  index_file: string;
}

export interface ScheduleConfig {
  cron: string;
  timezone: string;
}
