/**
 * 時刻処理ユーティリティのテスト
 */
import { compareTimestamps, normalizeTimestamp, toAlignmentKey, truncateToMinute } from '../../src/utils/time-utils';

describe('normalizeTimestamp', () => {
  it('dd/MM/yyyyTHH:mm:ss をISO形式に変換する', () => {
    expect(normalizeTimestamp('13/08/2025T07:45:01')).toBe('2025-08-13T07:45:01');
  });

  it('ゼロ埋めされていない値もゼロ埋めして変換する', () => {
    expect(normalizeTimestamp('1/3/2025T7:45:01')).toBe('2025-03-01T07:45:01');
    expect(normalizeTimestamp('9/11/2025T0:5:9')).toBe('2025-11-09T00:05:09');
  });

  it('前後の空白は無視する', () => {
    expect(normalizeTimestamp(' 01/01/2024T00:00:00 ')).toBe('2024-01-01T00:00:00');
  });

  it('存在しない日付・時刻はnull', () => {
    expect(normalizeTimestamp('31/02/2025T10:00:00')).toBeNull();
    expect(normalizeTimestamp('29/02/2023T10:00:00')).toBeNull();
    expect(normalizeTimestamp('01/13/2025T10:00:00')).toBeNull();
    expect(normalizeTimestamp('01/01/2025T24:00:00')).toBeNull();
  });

  it('うるう日は有効', () => {
    expect(normalizeTimestamp('29/02/2024T23:59:59')).toBe('2024-02-29T23:59:59');
  });

  it('形式が異なる場合はnull', () => {
    expect(normalizeTimestamp('2025-08-13T07:45:01')).toBeNull();
    expect(normalizeTimestamp('garbage')).toBeNull();
  });
});

describe('truncateToMinute', () => {
  it('秒を切り捨てる', () => {
    expect(truncateToMinute('2025-03-01T10:00:59')).toBe('2025-03-01T10:00:00');
    expect(truncateToMinute('2025-03-01T10:00:05.123Z')).toBe('2025-03-01T10:00:00Z');
    expect(truncateToMinute('2025-03-01T10:00+01:00')).toBe('2025-03-01T10:00:00+01:00');
  });

  it('ISO形式でない場合はそのまま返す', () => {
    expect(truncateToMinute('13/08/2025T07:45:01')).toBe('13/08/2025T07:45:01');
  });
});

describe('toAlignmentKey', () => {
  it('粒度に応じてキーを生成する', () => {
    expect(toAlignmentKey('2025-03-01T10:00:40', 'minute')).toBe('2025-03-01T10:00:00');
    expect(toAlignmentKey('2025-03-01T10:00:40', 'exact')).toBe('2025-03-01T10:00:40');
  });
});

describe('compareTimestamps', () => {
  it('文字列の昇順で比較する', () => {
    const sorted = ['2025-03-01T10:15:00', '2025-03-01T09:00:00', '2025-03-01T10:00:00'].sort(compareTimestamps);
    expect(sorted).toEqual(['2025-03-01T09:00:00', '2025-03-01T10:00:00', '2025-03-01T10:15:00']);
    expect(compareTimestamps('a', 'a')).toBe(0);
  });
});
