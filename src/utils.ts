export function envFlag(name: string): boolean {
  const v = (process.env[name] ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function isDryRun(): boolean {
  return envFlag('WEREWOLF_DRY_RUN') || envFlag('DRY_RUN');
}

export function dryRunSeed(): number {
  const raw = process.env.WEREWOLF_DRY_RUN_SEED;
  if (!raw) return 1;
  const n = Number(raw);
  return Number.isFinite(n) ? n : 1;
}

export function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Canonical comparison form of a name or a free-text vote. */
export function normalizeName(raw: string): string {
  return raw.trim().toLowerCase();
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
