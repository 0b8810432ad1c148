/**
 * コマンドライン引数パーサー
 */
import { Command } from 'commander';
import { VERSION, MODULE_NAME } from '../src';

/**
 * コマンドライン引数の型定義
 */
export interface CliOptions {
  /** 設定ファイルのパス */
  config?: string;
  /** センサー定義シートのパス（設定ファイルの値を上書き） */
  sensors?: string;
  /** 時系列ファイルの出力先ディレクトリ */
  outputDir?: string;
  /** インデックスファイルのパス */
  index?: string;
  /** 対象センサーID（設定ファイルの include を上書き） */
  only?: string[];
  /** 定期実行モード。文字列の場合はcron式の上書き */
  schedule?: boolean | string;
}

/**
 * コマンドライン引数を解析し、オプションオブジェクトを返す
 * @param args コマンドライン引数
 * @returns 解析されたオプション
 */
export function parseOptions(args: string[]): CliOptions {
  const program = new Command();

  // プログラム情報の設定
  program
    .name(MODULE_NAME)
    .description('Sentiloのセンサー観測値を取得し、ダッシュボード用の時系列JSONを出力するツール')
    .version(VERSION);

  program
    .option('-c, --config <path>', '設定ファイルのパス (デフォルト: ./config.yaml)')
    .option('-s, --sensors <path>', 'センサー定義シート (CSV) のパス')
    .option('-o, --output-dir <path>', '時系列ファイルの出力先ディレクトリ')
    .option('-i, --index <path>', 'インデックスファイルのパス')
    .option('--only <ids>', '対象センサーID (カンマ区切りで複数指定可能)')
    .option('--schedule [cron]', '定期実行モード (cron式省略時は設定ファイルの値)');

  // ヘルプテキスト
  program.addHelpText('after', `
例:
  # 設定ファイルの内容で1回実行
  $ sensor-harvester --config config.yaml

  # 特定のセンサーのみ
  $ sensor-harvester --only 0190_MV_C1_ASB_ACTIVEE,0524_MV_FVENERGIA

  # 15分ごとに定期実行
  $ sensor-harvester --schedule "*/15 * * * *"
  `);

  program.parse(args);
  const opts = program.opts();

  const options: CliOptions = {
    config: stringOpt(opts.config),
    sensors: stringOpt(opts.sensors),
    outputDir: stringOpt(opts.outputDir),
    index: stringOpt(opts.index)
  };

  // カンマ区切り文字列を配列に変換
  const only = stringOpt(opts.only);
  if (only) {
    options.only = only.split(',').map(id => id.trim()).filter(id => id !== '');
    if (options.only.length === 0) {
      throw new Error('--only にセンサーIDを指定してください');
    }
  }

  if (opts.schedule === true || typeof opts.schedule === 'string') {
    options.schedule = opts.schedule;
  }

  return options;
}

function stringOpt(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}
