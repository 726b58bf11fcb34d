// Result of one best-effort probe step. Failures carry a short reason for the log sink.
export type Probe<T> = { ok: true; value: T } | { ok: false; reason: string };

export function ok<T>(value: T): Probe<T> {
  return { ok: true, value };
}

export function absent<T = never>(reason: string): Probe<T> {
  return { ok: false, reason };
}

export function reasonOf(err: unknown): string {
  if (err instanceof Error) {
    if ('code' in err && typeof err.code === 'string') return err.code.toLowerCase();
    return err.message;
  }
  return String(err);
}

// First present value of a sequence of fallbacks, evaluated lazily in order.
export async function firstPresent<T>(steps: Array<() => Promise<Probe<T>>>): Promise<Probe<T>> {
  const reasons: string[] = [];
  for (const step of steps) {
    const res = await step();
    if (res.ok) return res;
    reasons.push(res.reason);
  }
  return absent(reasons.join(', ') || 'no_sources');
}
