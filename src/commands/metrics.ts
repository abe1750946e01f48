import { renderExposition } from '../metrics/tracker.js';
import { EXIT_OK, openEngine, printJson, resolveRun, RunCommandOptions } from './shared.js';

export type MetricsFormat = 'json' | 'prom';

export interface MetricsOptions extends RunCommandOptions {
  format: MetricsFormat;
}

export function parseMetricsFormat(value: string): MetricsFormat {
  if (value === 'json' || value === 'prom') {
    return value;
  }
  throw new Error(`Unknown metrics format "${value}": expected json or prom`);
}

export async function metricsCommand(options: MetricsOptions): Promise<number> {
  const runId = resolveRun(options);
  const { engine } = openEngine({ ...options, runId });
  const snapshot = engine.metrics();
  if (options.format === 'prom') {
    process.stdout.write(renderExposition(snapshot));
  } else {
    printJson(snapshot);
  }
  return EXIT_OK;
}
