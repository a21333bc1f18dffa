import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigurationError, formatErrorMessage } from '../common/errors';
import { parseVehicleFilter } from '../common/vehicle-id';
import type { PipelineSettings } from '../config/pipeline.config';
import type { RunOptions } from '../pipeline/dto/run-options.dto';

export const USAGE = `Usage: flight-risk run --source <s3://bucket/prefix | dir> [options]

Options:
  --source <location>       S3 prefix or local directory holding the logs (required)
  --summaries <path>        Per-log summary CSV (default: output/summaries.csv)
  --aggregated <path>       Per-vehicle CSV (default: output/aggregated_by_vehicle.csv)
  --report <path>           Fleet report (default: output/report.md)
  --risk-report <path>      Risk report (default: output/risk_report.md)
  --vehicles <ids>          Only these vehicles, comma or space separated; repeatable
  --workers <n>             Concurrent workers (default: PIPELINE_WORKERS or CPU count)
  --prefetch <n>            Schedule at most n logs not yet summarized; 0 = all
  --resume                  Keep existing summaries and skip logs already in them
  --dead-vehicles <path>    vehicle_id,dead CSV (default: DEAD_VEHICLES_CSV)
  --top <n>                 Show only the n highest-risk vehicles in the risk report
  -h, --help                Show this message
`;

const runArgsSchema = z.object({
  source: z.string({ required_error: '--source is required' }).trim().min(1, '--source is required'),
  summaries: z.string().min(1).default('output/summaries.csv'),
  aggregated: z.string().min(1).default('output/aggregated_by_vehicle.csv'),
  report: z.string().min(1).default('output/report.md'),
  'risk-report': z.string().min(1).default('output/risk_report.md'),
  vehicles: z.array(z.string()).optional(),
  workers: z.coerce.number().int().min(1).optional(),
  prefetch: z.coerce.number().int().min(0).default(0),
  resume: z.boolean().default(false),
  'dead-vehicles': z.string().min(1).optional(),
  top: z.coerce.number().int().min(1).optional(),
});

export type CommandLine = { kind: 'help' } | { kind: 'run'; options: RunOptions };

/**
 * Parse `run` arguments into RunOptions; settings fill in what the
 * command line leaves out.
 *
 * @throws ConfigurationError on unknown flags, a missing command or bad values
 */
export function parseCommandLine(argv: string[], settings: PipelineSettings): CommandLine {
  let parsed: ReturnType<typeof parseRunArgs>;
  try {
    parsed = parseRunArgs(argv);
  } catch (error) {
    throw new ConfigurationError(formatErrorMessage(error), error);
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length !== 1 || positionals[0] !== 'run') {
    throw new ConfigurationError(
      positionals.length === 0
        ? 'Missing command; expected "run"'
        : `Unknown command "${positionals.join(' ')}"; expected "run"`,
    );
  }

  const result = runArgsSchema.safeParse(values);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) =>
        issue.path.length > 0 && !issue.message.startsWith('--')
          ? `--${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ');
    throw new ConfigurationError(`Invalid arguments: ${issues}`);
  }

  const args = result.data;
  return {
    kind: 'run',
    options: {
      source: args.source,
      summariesPath: args.summaries,
      aggregatedPath: args.aggregated,
      reportPath: args.report,
      riskReportPath: args['risk-report'],
      vehicles: parseVehicleFilter(args.vehicles),
      workers: args.workers ?? settings.workers,
      prefetch: args.prefetch,
      resume: args.resume,
      deadVehiclesPath: args['dead-vehicles'] ?? settings.deadVehiclesCsv,
      top: args.top ?? null,
    },
  };
}

function parseRunArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      source: { type: 'string' },
      summaries: { type: 'string' },
      aggregated: { type: 'string' },
      report: { type: 'string' },
      'risk-report': { type: 'string' },
      vehicles: { type: 'string', multiple: true },
      workers: { type: 'string' },
      prefetch: { type: 'string' },
      resume: { type: 'boolean' },
      'dead-vehicles': { type: 'string' },
      top: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
