import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import os from 'os';
import * as p from '@clack/prompts';
import { extractCommand } from './extract.js';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
  },
}));

vi.mock('picocolors', () => ({
  default: {
    cyan: (s: string) => `[cyan]${s}[/cyan]`,
  },
}));

const { places } = vi.hoisted(() => ({ places: vi.fn() }));

vi.mock('compromise', () => ({
  default: () => ({ places: () => ({ out: places }) }),
}));

describe('extractCommand', () => {
  let tmpDir: string;
  let configPath: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    places.mockReturnValue([]);
    tmpDir = mkdtempSync(join(os.tmpdir(), 'extract-cmd-'));
    configPath = join(tmpDir, 'dispatch-nlu.json');
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    if (existsSync(tmpDir)) {
      rmSync(tmpDir, { recursive: true });
    }
  });

  it('prints one line per entity', async () => {
    const exitCode = await extractCommand([
      'kal morning pickup, fragile hai, COD',
      `--config=${configPath}`,
    ]);

    expect(exitCode).toBe(0);
    expect(p.log.message).toHaveBeenCalledWith(
      [
        'pickup_location: -',
        'drop_location: -',
        'weight_kg: -',
        'packages: -',
        'pickup_time: morning',
        'fragile: true',
        'payment_mode: COD',
        'phone_number: -',
      ].join('\n'),
    );
  });

  it('uses place tagger results when enabled', async () => {
    places.mockReturnValue(['Goa']);

    await extractCommand(['Goa se parcel bhejna hai', '--json', `--config=${configPath}`]);

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output).toMatchObject({ pickup_location: 'Goa', drop_location: null });
  });

  it('skips the place tagger when the config disables it', async () => {
    places.mockReturnValue(['Goa']);
    writeFileSync(configPath, JSON.stringify({ extraction: { use_location_recognizer: false } }), 'utf-8');

    await extractCommand(['Goa se parcel bhejna hai', '--json', `--config=${configPath}`]);

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output).toMatchObject({ pickup_location: null, drop_location: null });
    expect(places).not.toHaveBeenCalled();
  });

  it('returns 1 for an invalid config', async () => {
    writeFileSync(configPath, JSON.stringify({ extraction: { use_location_recognizer: 'yes' } }), 'utf-8');

    expect(await extractCommand(['Goa', `--config=${configPath}`])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      'Config validation failed:\nextraction.use_location_recognizer: Expected boolean, received string',
    );
  });

  it('returns 1 without request text', async () => {
    expect(await extractCommand([`--config=${configPath}`])).toBe(1);
  });
});
