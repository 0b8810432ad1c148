#!/usr/bin/env node
/**
 * Harvester CLIエントリーポイント
 */
import chalk from 'chalk';
import { parseOptions, CliOptions } from './options-parser';
import {
  harvest,
  loadConfig,
  loadSensorSheet,
  HarvesterConfig,
  HarvestResult,
  HarvestScheduler,
  JsonArtifactWriter,
  SentiloClient
} from '../src';

/**
 * コマンドラインオプションで設定をオーバーライド
 * @param config 元の設定
 * @param options コマンドラインオプション
 * @returns 更新された設定
 */
function overrideConfig(config: HarvesterConfig, options: CliOptions): HarvesterConfig {
  return {
    ...config,
    sensors: {
      ...config.sensors,
      file: options.sensors ?? config.sensors.file,
      include: options.only ?? config.sensors.include
    },
    output: {
      directory: options.outputDir ?? config.output.directory,
      index_file: options.index ?? config.output.index_file
    },
    schedule: {
      ...config.schedule,
      cron: typeof options.schedule === 'string' ? options.schedule : config.schedule.cron
    }
  };
}

/**
 * 1回分の処理（シート読み込み→取得→出力）
 * @param config 設定
 * @returns 実行結果
 */
async function runHarvest(config: HarvesterConfig, writer: JsonArtifactWriter): Promise<HarvestResult> {
  // sensor_id 列がない場合などはここで例外となり、実行全体を中止する
  const sensors = await loadSensorSheet(config.sensors.file, {
    separator: config.sensors.separator,
    defaultProvider: config.sentilo_api.default_provider,
    defaultTokenEnv: config.sentilo_api.default_token_env
  });

  const result = await harvest({
    config,
    sensors,
    source: new SentiloClient(config.sentilo_api),
    writer
  });

  printResult(result);
  return result;
}

/**
 * 結果の表示
 */
function printResult(result: HarvestResult): void {
  if (result.success) {
    console.log(chalk.green('✅ 処理が完了しました'));
  } else {
    console.error(chalk.red(`❌ エラーが発生しました: ${result.error?.message}`));
  }
  console.log(`  取得センサー数: ${chalk.yellow(String(result.stats.fetched))}`);
  console.log(`  計算センサー数: ${chalk.yellow(String(result.stats.derived))}`);
  console.log(`  インデックス掲載数: ${chalk.yellow(String(Object.keys(result.catalogue.sensors).length))}`);
  console.log(`  処理時間: ${chalk.yellow(String(result.stats.duration / 1000))} 秒`);

  if (result.failures.length > 0) {
    console.log(chalk.yellow(`失敗したセンサー (${result.failures.length}):`));
    result.failures.forEach(failure => {
      console.log(`  - ${failure.sensorId} [${failure.stage}] ${failure.message}`);
    });
  }
}

/**
 * 定期実行モード
 */
async function runScheduled(config: HarvesterConfig, writer: JsonArtifactWriter): Promise<void> {
  const scheduler = new HarvestScheduler(config.schedule, async () => {
    await runHarvest(config, writer);
  });

  const shutdown = (signal: string): void => {
    console.log(chalk.blue(`\n📨 Received ${signal}, stopping...`));
    scheduler.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await scheduler.start();
  console.log(chalk.blue('ℹ️  Press Ctrl+C to stop'));
}

/**
 * メイン実行関数
 */
async function main(): Promise<void> {
  const cliOptions = parseOptions(process.argv);
  const config = overrideConfig(await loadConfig(cliOptions.config), cliOptions);

  // 出力ディレクトリに書き込めない場合は取得を始める前に終了する
  const writer = new JsonArtifactWriter(config.output.directory, config.output.index_file);
  writer.ensureOutputDirectory();

  if (cliOptions.schedule) {
    await runScheduled(config, writer);
    return;
  }

  const result = await runHarvest(config, writer);
  if (!result.success) {
    process.exit(1);
  }
}

// スクリプト実行
main().catch(error => {
  console.error(chalk.red('予期しないエラーが発生しました:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
