/**
 * カタログ組み立てのテスト
 */
import { assembleCatalogue, seriesLocation } from '../../src/catalogue';
import { Series } from '../../src/types/series';

const GENERATED_AT = new Date('2025-03-01T10:20:00.000Z');

function series(sensorId: string, count: number): Series {
  return {
    sensorId,
    description: `desc ${sensorId}`,
    unit: 'kWh',
    kind: 'interval_consumption',
    samples: Array.from({ length: count }, (_, i) => ({ timestamp: `2025-03-01T10:0${i}:00`, value: i }))
  };
}

describe('seriesLocation', () => {
  it('センサーIDからファイル名を決定的に生成する', () => {
    expect(seriesLocation('0190_MV_C1')).toBe('0190_MV_C1.json');
    expect(seriesLocation('0190_MV_C1')).toBe(seriesLocation('0190_MV_C1'));
  });

  it('パス区切りなどを含むIDも衝突しない', () => {
    expect(seriesLocation('a/b')).toBe('a%2Fb.json');
    expect(seriesLocation('a%2Fb')).toBe('a%252Fb.json');
    expect(seriesLocation('Sala 1')).toBe('Sala%201.json');
  });
});

describe('assembleCatalogue', () => {
  it('1点以上の時系列のみ掲載する', () => {
    const catalogue = assembleCatalogue([series('A', 2), series('EMPTY', 0), series('B', 1)], {
      generatedAt: GENERATED_AT,
      provider: 'SIGE_PR_0190'
    });

    expect(catalogue).toEqual({
      generatedAt: '2025-03-01T10:20:00.000Z',
      provider: 'SIGE_PR_0190',
      sensors: {
        A: { description: 'desc A', unit: 'kWh', kind: 'interval_consumption', location: 'A.json' },
        B: { description: 'desc B', unit: 'kWh', kind: 'interval_consumption', location: 'B.json' }
      }
    });
  });

  it('プロバイダ未指定の場合は provider を含めない', () => {
    const catalogue = assembleCatalogue([], { generatedAt: GENERATED_AT });
    expect(catalogue).toEqual({ generatedAt: '2025-03-01T10:20:00.000Z', sensors: {} });
    expect('provider' in catalogue).toBe(false);
  });
});
