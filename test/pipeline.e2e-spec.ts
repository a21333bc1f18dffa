import { Test, TestingModule } from '@nestjs/testing';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { AppModule } from '../src/app.module';
import { PIPELINE_SETTINGS } from '../src/config/pipeline.config';
import { bootstrap, EXIT_CONFIGURATION, EXIT_OK } from '../src/main';
import { PipelineService } from '../src/pipeline/pipeline.service';
import { SummaryStore } from '../src/pipeline/summary-store';
import { calmFlightULog, truncatedULog } from './utils/fleet-fixtures';
import { createRunOptions } from './utils/run-options';
import { makeTempDir, removeDir, testSettings } from './utils/test-helpers';

describe('Pipeline (e2e)', () => {
  let module: TestingModule;
  let pipeline: PipelineService;
  let dir: string;
  let logs: string;

  const writeLog = async (relative: string, bytes: Buffer) => {
    const filePath = path.join(logs, relative);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, bytes);
  };

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(PIPELINE_SETTINGS)
      .useValue(testSettings())
      .compile();
    pipeline = module.get<PipelineService>(PipelineService);

    dir = await makeTempDir('fleet');
    logs = path.join(dir, 'logs');
    await writeLog('EL-040/2024-05-01/a.ulg', calmFlightULog());
    await writeLog('EL-040/2024-05-01/b.ulg', calmFlightULog(5_000_000));
    await writeLog('EL-040/2024-05-02/c.ulg', calmFlightULog());
    await writeLog('EL-041/bad.ulg', truncatedULog());
    await writeLog('EL-052/x.ulg', calmFlightULog());
    await writeLog('EL052/y.ulg', calmFlightULog());
    await writeLog('README.md', Buffer.from('# fleet logs'));
  });

  afterEach(async () => {
    await module.close();
    await removeDir(dir);
  });

  const readLines = async (filePath: string) =>
    (await fs.readFile(filePath, 'utf-8')).trimEnd().split('\n');

  it('should summarize calm flights as fully low-vibration with no saturation', async () => {
    const options = createRunOptions(dir, { source: logs });

    const report = await pipeline.run(options);

    expect(report).toMatchObject({ listed: 6, processed: 5, failed: 1, aborted: false });
    expect(report.failures).toEqual([
      {
        identifier: 'EL-041/bad.ulg',
        kind: 'corrupt_format',
        message: '[ulog] Truncated ULog header',
      },
    ]);

    const summaries = await new SummaryStore(options.summariesPath).readAll();
    const el040 = summaries.filter((summary) => summary.vehicleId === 'EL-040');
    expect(el040).toHaveLength(3);
    for (const summary of el040) {
      expect(summary.durationTrackedS).toBe(1);
      expect(summary.vibrationShare).toEqual([1, 0, 0, 0]);
      expect(summary.motorSaturationS.flat()).toEqual(Array(12).fill(0));
      expect(summary.peakAccelCount).toBe(0);
      expect(summary.clipCount).toBe(0);
    }

    const aggregated = await readLines(options.aggregatedPath);
    expect(aggregated[1]).toBe(
      ['EL-040', '3', '3', '3', '0', '0', '0', '1', '0', '0', '0', ...Array(15).fill('0')].join(','),
    );
  });

  it('should merge EL-052 and EL052 into one vehicle', async () => {
    const options = createRunOptions(dir, { source: logs });

    await pipeline.run(options);

    const aggregated = await readLines(options.aggregatedPath);
    expect(aggregated.map((line) => line.split(',').slice(0, 2).join(','))).toEqual([
      'vehicle_id,log_count',
      'EL-040,3',
      'EL-052,2',
    ]);
    expect(await readLines(options.reportPath)).toContain(
      '- Vehicles in report: EL-040, EL-052',
    );
  });

  it('should change nothing when resumed after a complete run', async () => {
    const options = createRunOptions(dir, { source: logs });
    await pipeline.run(options);
    const before = await Promise.all(
      [options.summariesPath, options.aggregatedPath, options.reportPath, options.riskReportPath].map(
        (filePath) => fs.readFile(filePath, 'utf-8'),
      ),
    );

    const report = await pipeline.run({ ...options, resume: true });

    expect(report).toMatchObject({ processed: 0, skippedAlreadyDone: 5, failed: 1 });
    const after = await Promise.all(
      [options.summariesPath, options.aggregatedPath, options.reportPath, options.riskReportPath].map(
        (filePath) => fs.readFile(filePath, 'utf-8'),
      ),
    );
    expect(after).toEqual(before);
  });

  it('should produce identical aggregates with one worker and with four', async () => {
    const one = createRunOptions(path.join(dir, 'one'), { source: logs, workers: 1 });
    const four = createRunOptions(path.join(dir, 'four'), { source: logs, workers: 4 });

    await pipeline.run(one);
    await pipeline.run(four);

    expect(await fs.readFile(four.aggregatedPath, 'utf-8')).toBe(
      await fs.readFile(one.aggregatedPath, 'utf-8'),
    );
    expect(await fs.readFile(four.riskReportPath, 'utf-8')).toBe(
      await fs.readFile(one.riskReportPath, 'utf-8'),
    );
  });

  describe('bootstrap', () => {
    it('should exit 0 after a run with per-log failures', async () => {
      const out = path.join(dir, 'cli');

      const code = await bootstrap([
        'run',
        '--source',
        logs,
        '--summaries',
        path.join(out, 'summaries.csv'),
        '--aggregated',
        path.join(out, 'aggregated.csv'),
        '--report',
        path.join(out, 'report.md'),
        '--risk-report',
        path.join(out, 'risk.md'),
        '--workers',
        '2',
      ]);

      expect(code).toBe(EXIT_OK);
      expect(await new SummaryStore(path.join(out, 'summaries.csv')).readIdentifiers()).toHaveLength(5);
    });

    it('should exit 2 when the source does not exist', async () => {
      expect(await bootstrap(['run', '--source', path.join(dir, 'missing')])).toBe(
        EXIT_CONFIGURATION,
      );
    });

    it('should exit 2 on an unknown command', async () => {
      expect(await bootstrap(['sync'])).toBe(EXIT_CONFIGURATION);
    });
  });
});
