import { parseStatcastCsv } from './StatcastCsv';

const HEADER =
  'pitch_type,game_date,release_speed,release_pos_x,release_pos_z,player_name,pitcher,' +
  'release_spin_rate,release_extension,pfx_x,pfx_z,plate_x,plate_z';

describe('parseStatcastCsv', () => {
  test('maps Statcast columns onto pitch events', () => {
    const csv = [
      HEADER,
      'FF,2024-05-02,97.1,-1.85,5.91,"Pitcher, Test",100001,2405,6.8,-0.62,1.41,0.12,2.95',
    ].join('\n');

    const { events, rowCount, skippedRows } = parseStatcastCsv(csv);

    expect(rowCount).toBe(1);
    expect(skippedRows).toBe(0);
    expect(events).toEqual([
      {
        pitcherId: 100001,
        pitchType: 'FF',
        gameDate: '2024-05-02',
        releaseSpeed: 97.1,
        releaseSpinRate: 2405,
        releasePosX: -1.85,
        releasePosZ: 5.91,
        releaseExtension: 6.8,
        pfxX: -0.62,
        pfxZ: 1.41,
        plateX: 0.12,
        plateZ: 2.95,
      },
    ]);
  });

  test('treats empty, null and NaN cells as missing', () => {
    const csv = [
      HEADER,
      'SL,2024-05-02,,-1.9,5.8,"Pitcher, Test",100001,null,NaN,0.31,0.05,,1.8',
    ].join('\n');

    const [event] = parseStatcastCsv(csv).events;

    expect(event.releaseSpeed).toBeNull();
    expect(event.releaseSpinRate).toBeNull();
    expect(event.releaseExtension).toBeNull();
    expect(event.plateX).toBeNull();
    expect(event.releasePosX).toBe(-1.9);
    expect(event.plateZ).toBe(1.8);
  });

  test('skips rows without a pitch type or pitcher id', () => {
    const csv = [
      HEADER,
      ',2024-05-02,95.0,-1.9,5.8,"Pitcher, Test",100001,2300,6.5,-0.5,1.3,0.0,2.5',
      'CH,2024-05-02,86.0,-1.9,5.8,"Pitcher, Test",,1700,6.5,-1.2,0.6,0.4,1.9',
      'CH,2024-05-02,86.5,-1.9,5.8,"Pitcher, Test",100001,1750,6.5,-1.1,0.7,0.3,2.0',
    ].join('\n');

    const result = parseStatcastCsv(csv);

    expect(result.rowCount).toBe(3);
    expect(result.skippedRows).toBe(2);
    expect(result.events.map(e => e.releaseSpeed)).toEqual([86.5]);
  });

  test('strips a byte order mark before the header', () => {
    const csv = `\uFEFF${HEADER}\nCU,2024-06-01,79.4,-1.7,6.0,"Pitcher, Test",100002,2710,6.2,0.8,-1.1,-0.2,1.6`;

    const { events } = parseStatcastCsv(csv);

    expect(events[0].pitchType).toBe('CU');
    expect(events[0].pitcherId).toBe(100002);
  });

  test('returns no events for an empty body', () => {
    expect(parseStatcastCsv('')).toEqual({ events: [], rowCount: 0, skippedRows: 0 });
  });

  test('returns no events for a header with no rows', () => {
    expect(parseStatcastCsv(`${HEADER}\n`).events).toEqual([]);
  });

  test('throws when required columns are missing', () => {
    expect(() => parseStatcastCsv('game_date,release_speed\n2024-05-02,95.0')).toThrow(
      'Statcast CSV is missing required column(s): pitcher, pitch_type'
    );
  });
});
