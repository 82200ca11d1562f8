import type { OutdatedPackage } from './types.js';

/**
 * Decoders for each manager's "outdated" output.
 * They skip entries they cannot read rather than failing the whole listing;
 * only output that is not in the expected shape at all throws.
 */

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (typeof value === 'number') return String(value);
  return undefined;
}

function parseJson(output: string): unknown {
  const trimmed = output.trim();
  if (!trimmed) return undefined;
  try {
    return JSON.parse(trimmed);
  } catch {
    throw new Error(`Unexpected output (not JSON): ${trimmed.slice(0, 80)}`);
  }
}

function dedupe(packages: OutdatedPackage[]): OutdatedPackage[] {
  const seen = new Set<string>();
  return packages.filter(pkg => {
    if (seen.has(pkg.name)) return false;
    seen.add(pkg.name);
    return true;
  });
}

/**
 * `npm outdated --json` and `pnpm outdated --format json`:
 * an object keyed by package name. npm emits an array per name when the
 * package appears in several workspace locations.
 */
export function parseNodeOutdated(output: string): OutdatedPackage[] {
  const data = parseJson(output);
  if (data === undefined) return [];
  if (!isRecord(data)) {
    throw new Error('Unexpected output: expected an object keyed by package name');
  }
  // npm reports its own failures as { "error": { code, summary, detail } }
  if (isRecord(data.error)) {
    const code = str(data.error.code);
    const summary = str(data.error.summary) ?? str(data.error.detail) ?? 'unknown error';
    throw new Error(code ? `${code}: ${summary}` : summary);
  }

  const packages: OutdatedPackage[] = [];
  for (const [name, raw] of Object.entries(data)) {
    const entry = Array.isArray(raw) ? raw[0] : raw;
    if (!name || !isRecord(entry)) continue;

    const latestVersion = str(entry.latest);
    if (!latestVersion) continue;

    packages.push({
      name,
      currentVersion: str(entry.current) ?? '-',
      latestVersion
    });
  }
  return dedupe(packages);
}

/**
 * `pip list --outdated --format=json`: an array of
 * `{ name, version, latest_version, latest_filetype }`.
 */
export function parsePipOutdated(output: string): OutdatedPackage[] {
  const data = parseJson(output);
  if (data === undefined) return [];
  if (!Array.isArray(data)) {
    throw new Error('Unexpected output: expected an array of packages');
  }

  const packages: OutdatedPackage[] = [];
  for (const entry of data) {
    if (!isRecord(entry)) continue;
    const name = str(entry.name);
    const latestVersion = str(entry.latest_version);
    if (!name || !latestVersion) continue;

    const latestFiletype = str(entry.latest_filetype);
    packages.push({
      name,
      currentVersion: str(entry.version) ?? '-',
      latestVersion,
      ...(latestFiletype ? { latestFiletype } : {})
    });
  }
  return dedupe(packages);
}

/**
 * `yarn outdated --json` (classic): newline-delimited JSON events, one of
 * which is `{ type: "table", data: { head: [...], body: [[...]] } }`.
 */
export function parseYarnOutdated(output: string): OutdatedPackage[] {
  const lines = output.split('\n').map(line => line.trim()).filter(Boolean);

  for (const line of lines) {
    let event: unknown;
    try {
      event = JSON.parse(line);
    } catch {
      continue;
    }
    if (!isRecord(event) || event.type !== 'table' || !isRecord(event.data)) continue;

    const head = Array.isArray(event.data.head) ? event.data.head.map(h => String(h).toLowerCase()) : [];
    const body = Array.isArray(event.data.body) ? event.data.body : [];
    const column = (label: string, fallback: number) => {
      const index = head.indexOf(label);
      return index >= 0 ? index : fallback;
    };
    const nameAt = column('package', 0);
    const currentAt = column('current', 1);
    const latestAt = column('latest', 3);

    const packages: OutdatedPackage[] = [];
    for (const row of body) {
      if (!Array.isArray(row)) continue;
      const name = str(row[nameAt]);
      const latestVersion = str(row[latestAt]);
      if (!name || !latestVersion) continue;
      packages.push({ name, currentVersion: str(row[currentAt]) ?? '-', latestVersion });
    }
    return dedupe(packages);
  }

  return [];
}
