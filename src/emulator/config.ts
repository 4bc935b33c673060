export type CpuErrorMode = 'ignore' | 'throw' | 'record';

export interface RuntimeConfig {
  cpuHz: number; // instructions per second
  timerHz: number; // delay/sound timer ticks per second
  onCpuError: CpuErrorMode;
  traceEveryInstr: number; // 0 = off
}

export const DEFAULT_CONFIG: RuntimeConfig = {
  cpuHz: 60,
  timerHz: 60,
  onCpuError: 'record',
  traceEveryInstr: 0,
};

const ERROR_MODES: readonly CpuErrorMode[] = ['ignore', 'throw', 'record'];

export function isCpuErrorMode(v: string): v is CpuErrorMode {
  return ERROR_MODES.some((m) => m === v);
}

// Positive rate, or undefined when missing or not a number
export function parseRate(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function readConfigFromEnv(env: Record<string, string | undefined> = process.env): RuntimeConfig {
  const mode = (env.CHIP8_ON_CPU_ERROR ?? '').toLowerCase();
  const trace = Number(env.CHIP8_TRACE ?? '0');
  return {
    cpuHz: parseRate(env.CHIP8_CPU_HZ) ?? DEFAULT_CONFIG.cpuHz,
    timerHz: parseRate(env.CHIP8_TIMER_HZ) ?? DEFAULT_CONFIG.timerHz,
    onCpuError: isCpuErrorMode(mode) ? mode : DEFAULT_CONFIG.onCpuError,
    traceEveryInstr: Number.isFinite(trace) && trace > 0 ? Math.floor(trace) : 0,
  };
}
