/**
 * Sentilo APIクライアント
 * センサーごとの観測値を取得する
 */
import { HttpClient } from './io/http';
import { SentiloApiConfig } from './types/config';
import { RawObservation, SensorDefinition } from './types/series';

/**
 * 観測値の取得パラメータ
 */
export interface FetchObservationsOptions {
  limit: number;
}

/**
 * 観測値の取得元
 * 取得に失敗した場合は例外を投げる（呼び出し側でセンサー単位に隔離する）
 */
export interface ObservationSource {
  fetchObservations(sensor: SensorDefinition, options: FetchObservationsOptions): Promise<RawObservation[]>;
}

/**
 * 環境変数名からトークンを取り出す関数
 */
export type TokenResolver = (tokenEnv: string) => string;

export const envTokenResolver: TokenResolver = tokenEnv => (process.env[tokenEnv] ?? '').trim();

/**
 * Sentilo APIクライアントクラス
 */
export class SentiloClient implements ObservationSource {
  private httpClient: HttpClient;

  /**
   * @param config API設定
   * @param resolveToken トークンの取得方法（デフォルト: 環境変数）
   */
  constructor(private config: SentiloApiConfig, private resolveToken: TokenResolver = envTokenResolver) {
    this.httpClient = new HttpClient({ baseUrl: config.base_url, timeout: config.timeout });
  }

  /**
   * センサーの観測値を取得
   * @param sensor センサー定義（ルーティング情報を含む）
   * @param options 取得件数
   * @returns 生の観測値
   */
  async fetchObservations(sensor: SensorDefinition, options: FetchObservationsOptions): Promise<RawObservation[]> {
    const { descriptor, route } = sensor;

    const token = this.resolveToken(route.tokenEnv);
    if (!token) {
      throw new Error(`トークンが空です: 環境変数 ${route.tokenEnv} を確認してください`);
    }

    const url = `/data/${encodeURIComponent(route.providerId)}/${encodeURIComponent(descriptor.id)}`;

    try {
      const response = await this.httpClient.get(
        url,
        { limit: options.limit, order: this.config.order },
        { IDENTITY_KEY: token }
      );
      return toRawObservations(response);
    } catch (error) {
      throw new Error(`センサー ${descriptor.id} の観測値取得に失敗しました: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

/**
 * Sentiloのレスポンスを生の観測値に変換
 * { "observations": [ { "value": "...", "timestamp": "13/08/2025T07:45:01" }, ... ] }
 * @param response レスポンスボディ
 * @returns 生の観測値（observations がない場合は空配列）
 */
export function toRawObservations(response: unknown): RawObservation[] {
  if (typeof response !== 'object' || response === null || !('observations' in response)) {
    return [];
  }

  const { observations } = response;
  if (!Array.isArray(observations)) {
    return [];
  }

  return observations.map((observation: unknown): RawObservation => {
    if (typeof observation !== 'object' || observation === null) {
      return {};
    }
    const timestamp = 'timestamp' in observation ? observation.timestamp : undefined;
    const value = 'value' in observation ? observation.value : undefined;

    return {
      timestamp: typeof timestamp === 'string' ? timestamp : null,
      // 値がJSONオブジェクトのまま返る場合は文字列に戻す
      rawPayload: typeof value === 'string' ? value
        : typeof value === 'object' && value !== null ? JSON.stringify(value)
        : null
    };
  });
}
