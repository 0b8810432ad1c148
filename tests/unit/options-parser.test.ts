/**
 * コマンドライン引数パーサーのテスト
 */
import { parseOptions } from '../../cli/options-parser';

const argv = (...args: string[]) => ['node', 'sensor-harvester', ...args];

describe('parseOptions', () => {
  it('オプションなしの場合はすべて未指定', () => {
    expect(parseOptions(argv())).toEqual({
      config: undefined,
      sensors: undefined,
      outputDir: undefined,
      index: undefined
    });
  });

  it('パスのオプションを解析する', () => {
    const options = parseOptions(argv('-c', 'prod.yaml', '--sensors', 'sheet.csv', '-o', 'out', '--index', 'out/index.json'));
    expect(options).toMatchObject({
      config: 'prod.yaml',
      sensors: 'sheet.csv',
      outputDir: 'out',
      index: 'out/index.json'
    });
  });

  it('--only をカンマ区切りで配列にする', () => {
    expect(parseOptions(argv('--only', 'A, B,,C')).only).toEqual(['A', 'B', 'C']);
  });

  it('--only が空の場合はエラー', () => {
    expect(() => parseOptions(argv('--only', ' , '))).toThrow('--only にセンサーIDを指定してください');
  });

  it('--schedule はcron式を省略できる', () => {
    expect(parseOptions(argv('--schedule')).schedule).toBe(true);
    expect(parseOptions(argv('--schedule', '0 * * * *')).schedule).toBe('0 * * * *');
    expect(parseOptions(argv()).schedule).toBeUndefined();
  });
});
