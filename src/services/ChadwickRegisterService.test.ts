import * as path from 'path';
import { ChadwickRegisterService } from './ChadwickRegisterService';

const FIXTURE = path.join(__dirname, '..', '..', 'tests', 'fixtures', 'chadwick_people.csv');

describe('ChadwickRegisterService', () => {
  const service = new ChadwickRegisterService(FIXTURE);

  test('joins first and last name for requested ids', async () => {
    const names = await service.resolveNames([100002, 100001]);

    expect(names.get(100001)).toBe('Alpha Tester');
    expect(names.get(100002)).toBe('Beta Sample');
    expect(names.size).toBe(2);
  });

  test('uses whatever name parts exist', async () => {
    const names = await service.resolveNames([100004]);

    expect(names.get(100004)).toBe('Example');
  });

  test('leaves unknown ids out of the map', async () => {
    const names = await service.resolveNames([100001, 999999]);

    expect([...names.keys()]).toEqual([100001]);
  });

  test('rejects when the register file does not exist', async () => {
    const missing = new ChadwickRegisterService(path.join(__dirname, 'no-such-register.csv'));

    await expect(missing.resolveNames([100001])).rejects.toThrow('ENOENT');
  });
});
