/**
 * 定期実行スケジューラー
 */
import * as cron from 'node-cron';
import { ScheduleConfig } from './types/config';

export type ScheduledJob = () => Promise<void>;

export class HarvestScheduler {
  private task: cron.ScheduledTask | null = null;
  private running = false;
  private runCount = 0;
  private skippedCount = 0;
  private lastRunAt?: string;

  /**
   * @param config cron式とタイムゾーン
   * @param job 1回分の処理
   */
  constructor(private config: ScheduleConfig, private job: ScheduledJob) {
    if (!cron.validate(config.cron)) {
      throw new Error(`cron式が正しくありません: ${config.cron}`);
    }
  }

  /**
   * 初回実行の後、スケジュールを開始
   */
  async start(): Promise<void> {
    console.log(`⏰ Schedule: "${this.config.cron}" (${this.config.timezone})`);

    console.log('Performing initial harvest...');
    await this.runOnce();

    this.task = cron.schedule(this.config.cron, () => this.runOnce(), {
      scheduled: true,
      timezone: this.config.timezone
    });
    console.log('Scheduled task created');
  }

  /**
   * 1回分の処理を実行（前回の処理が終わっていない場合はスキップ）
   */
  async runOnce(): Promise<void> {
    if (this.running) {
      this.skippedCount++;
      console.warn('⚠️  Previous harvest still running, skipping this tick');
      return;
    }

    this.running = true;
    this.lastRunAt = new Date().toISOString();
    try {
      console.log(`\n=== Scheduled harvest (${this.lastRunAt}) ===`);
      await this.job();
      this.runCount++;
    } catch (error) {
      console.error('❌ Scheduled harvest failed:', error);
    } finally {
      this.running = false;
    }
  }

  /**
   * スケジュールを停止
   */
  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log('Scheduler stopped');
    }
  }

  /**
   * スケジューラーの状態を取得
   */
  getStatus(): { scheduled: boolean; running: boolean; runCount: number; skippedCount: number; lastRunAt?: string } {
    return {
      scheduled: this.task !== null,
      running: this.running,
      runCount: this.runCount,
      skippedCount: this.skippedCount,
      lastRunAt: this.lastRunAt
    };
  }
}
