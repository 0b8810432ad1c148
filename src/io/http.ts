/**
 * HTTP通信モジュール
 * APIリクエストの共通処理を提供
 */
import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';

export interface HttpClientOptions {
  baseUrl: string;
  timeout: number;
}

/**
 * HTTP通信クライアントクラス
 */
export class HttpClient {
  private client: AxiosInstance;

  /**
   * @param options 接続先とタイムアウト
   */
  constructor(options: HttpClientOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout,
      headers: {
        'Accept': 'application/json',
      },
    });

    // レスポンスインターセプタ
    this.client.interceptors.response.use(
      response => response,
      error => this.handleError(error)
    );
  }

  /**
   * GETリクエストを送信
   * @param url エンドポイントURL
   * @param params クエリパラメータ
   * @param headers 追加のリクエストヘッダー
   * @returns レスポンスデータ（未検証）
   */
  async get(url: string, params?: Record<string, string | number>, headers?: Record<string, string>): Promise<unknown> {
    const config: AxiosRequestConfig = { params, headers };
    const response = await this.client.get<unknown>(url, config);
    return response.data;
  }

  /**
   * エラー時のレスポンス処理
   * @param error エラー
   * @throws 整形されたエラー
   */
  private handleError(error: unknown): never {
    if (axios.isAxiosError(error)) {
      const { response, request, message } = error;

      // レスポンスがある場合（サーバーからのエラー）
      if (response) {
        const data: unknown = response.data;
        let errorMessage = `サーバーエラー (${response.status})`;
        if (typeof data === 'object' && data !== null && 'message' in data) {
          errorMessage += `: ${String(data.message)}`;
        }
        throw new Error(errorMessage);
      }

      // リクエスト送信後にレスポンスがない場合
      if (request) {
        throw new Error(`応答なし: サーバーに到達できませんでした (${error.code ?? message})`);
      }

      // リクエスト設定時のエラー
      throw new Error(`リクエスト設定エラー: ${message}`);
    }

    // その他のエラー
    throw error;
  }
}
