/**
 * センサー・観測値・時系列の型定義
 */

/**
 * 観測値の種別（分類器の判定結果）
 * - energy: カウンタ型（区間の first/last の差分）
 * - instantaneous: 瞬時値型（区間の平均値）
 */
export type ObservationKind = 'energy' | 'instantaneous';

/**
 * 時系列の種別（出力ファイルの tipo_dato に書き出される値）
 */
export type SeriesKind = 'interval_consumption' | 'instantaneous';

/**
 * センサーの識別情報とメタデータ
 */
export interface SensorDescriptor {
  /** センサーID（実行内で一意） */
  id: string;
  /** 説明文（分類と表示に使用） */
  description: string;
  /** 表示用の単位（空文字の場合あり） */
  unit: string;
}

/**
 * センサーごとの取得先ルーティング情報
 * 設定読み込み時に一度だけ解決する
 */
export interface SensorRoute {
  /** Sentiloのプロバイダ ID */
  providerId: string;
  /** トークンを保持する環境変数名 */
  tokenEnv: string;
  /** 計算センサー（取得対象外）かどうか */
  calculated: boolean;
}

/**
 * センサー定義（定義シートの1行に相当）
 */
export interface SensorDefinition {
  descriptor: SensorDescriptor;
  route: SensorRoute;
}

/**
 * 外部APIから取得した生の観測値
 * どちらのフィールドも欠落・不正の可能性がある
 */
export interface RawObservation {
  timestamp?: string | null;
  rawPayload?: string | null;
}

/**
 * 検証済みの1点
 */
export interface Sample {
  /** ISO 8601形式（正規化できなかった場合は元の文字列） */
  timestamp: string;
  /** 常に有限値 */
  value: number;
}

/**
 * センサー1本分の正規化済み時系列
 */
export interface Series {
  sensorId: string;
  description: string;
  unit: string;
  kind: SeriesKind;
  /** タイムスタンプ昇順 */
  samples: Sample[];
}
