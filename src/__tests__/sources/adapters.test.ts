import { describe, expect, test } from 'vitest';
import { getSourceAdapter, listSourceAdapters } from '../../services/sources/factory';
import { salarySourceAdapter } from '../../services/sources/providers/salary.provider';
import { statsSourceAdapter } from '../../services/sources/providers/stats.provider';
import { InvalidRecordError, NotFoundError } from '../../utils/errors';

describe('SalarySourceAdapter', () => {
  test('converts a salary row', () => {
    const record = salarySourceAdapter.toRecord({
      ID: 30001,
      Name: "Ja'Marr Chase",
      Position: 'WR',
      TeamAbbrev: 'CIN',
      'Roster Position': 'WR/FLEX',
      Salary: 9800,
    });

    expect(record).toEqual({
      source: 'draftkings',
      externalId: '30001',
      name: "Ja'Marr Chase",
      position: 'WR',
      team: 'CIN',
    });
  });

  test('matches headers case-insensitively and falls back to the roster position', () => {
    const record = salarySourceAdapter.toRecord({
      id: '30002',
      name: 'Christian McCaffrey',
      position: '',
      teamabbrev: 'SF',
      'ROSTER POSITION': 'RB/FLEX',
    });

    expect(record.position).toBe('RB');
    expect(record.team).toBe('SF');
  });

  test('rejects non-numeric ids', () => {
    expect(() => salarySourceAdapter.toRecord({ ID: 'abc', Name: 'Someone' })).toThrow(InvalidRecordError);
  });

  test('parses a CSV export and reports bad rows', () => {
    const csv = [
      'Position,Name + ID,Name,ID,Roster Position,Salary,TeamAbbrev',
      "WR,Ja'Marr Chase (30001),Ja'Marr Chase,30001,WR/FLEX,9800,CIN",
      'WR,Bad Row (abc),Bad Row,abc,WR/FLEX,3000,CIN',
    ].join('\n');

    const report = salarySourceAdapter.parseCsv(csv);

    expect(report.records).toEqual([
      { source: 'draftkings', externalId: '30001', name: "Ja'Marr Chase", position: 'WR', team: 'CIN' },
    ]);
    expect(report.errors).toEqual([{ row: 2, message: 'externalId: must be numeric' }]);
    expect(report.rowCount).toBe(2);
    expect(report.unknownColumns).toEqual(['name + id', 'salary']);
  });
});

describe('StatsSourceAdapter', () => {
  test('converts a stats row with an alphanumeric id', () => {
    const record = statsSourceAdapter.toRecord({
      player_id: '00-0036900',
      player_name: 'J.Chase',
      position: 'WR',
      recent_team: 'CIN',
    });

    expect(record).toEqual({
      source: 'nfl_api',
      externalId: '00-0036900',
      name: 'J.Chase',
      position: 'WR',
      team: 'CIN',
    });
  });

  test('rejects rows without a name', () => {
    expect(() => statsSourceAdapter.toRecord({ player_id: '00-0036900' })).toThrow(InvalidRecordError);
  });
});

describe('getSourceAdapter', () => {
  test('finds adapters by name', () => {
    expect(getSourceAdapter('DraftKings')).toBe(salarySourceAdapter);
    expect(getSourceAdapter('nfl_api')).toBe(statsSourceAdapter);
    expect(listSourceAdapters()).toEqual(['draftkings', 'nfl_api']);
  });

  test('rejects unknown sources', () => {
    expect(() => getSourceAdapter('fanduel')).toThrow(NotFoundError);
  });
});
