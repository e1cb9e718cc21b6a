import { c } from './ansi.js';
import type { ProbeStep, TelemetryProvider } from './telemetry/provider.js';
import { memoryPercent, powerPercent } from './telemetry/query.js';

export type Print = (line: string) => void;

/** One poll as pretty JSON, with the derived percentages alongside the raw readings. */
export async function printSnapshot(provider: TelemetryProvider, print: Print): Promise<void> {
  const snapshots = await provider.poll();
  const gpus = snapshots.map(gpu => ({
    ...gpu,
    memory_percent: memoryPercent(gpu),
    power_percent: powerPercent(gpu),
  }));
  print(JSON.stringify({ source: provider.name, gpus }, null, 2));
}

/** Print diagnostic steps; resolves true when every step passed. */
export function printProbe(steps: ProbeStep[], print: Print): boolean {
  for (const step of steps) {
    const mark = step.ok ? c.green('OK   ') : c.red('FAIL ');
    const [first = '', ...rest] = step.detail.split('\n');
    print(`${mark}${c.bold(step.label)}  ${first}`);
    for (const line of rest) print(`       ${c.dim(line)}`);
  }
  const ok = steps.length > 0 && steps.every(step => step.ok);
  if (!ok) {
    print('');
    print(c.yellow('Make sure the NVIDIA driver is installed and nvidia-smi is on PATH,'));
    print(c.yellow('or point GPUWATCH_NVIDIA_SMI at the executable.'));
  }
  return ok;
}
