import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export async function makeTmpDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `bench-tables-${prefix}-`));
}

/** Writes `<groupDir>/<name>/new/estimates.json`; pass a string to write raw (possibly broken) content. */
export async function writeResultDir(
  groupDir: string,
  name: string,
  estimates?: number | string | Record<string, unknown>
): Promise<string> {
  const dir = path.join(groupDir, name);
  await fs.mkdir(path.join(dir, 'new'), { recursive: true });
  if (estimates === undefined) return dir;

  const payload =
    typeof estimates === 'number'
      ? JSON.stringify({ mean: { point_estimate: estimates }, median: { point_estimate: estimates / 2 } })
      : typeof estimates === 'string'
        ? estimates
        : JSON.stringify(estimates);
  await fs.writeFile(path.join(dir, 'new', 'estimates.json'), payload, 'utf8');
  return dir;
}
