import { existsSync, readFileSync } from 'fs';
import { ConfigInvalidError } from './errors.js';
import { parseConfig } from './config.js';
import { writeJson } from './output.js';
import type { HubConfig } from './config.js';

export interface RegistrationEntry {
  name: string;
  path: string;
  dependsOn?: string[];
  canonicalRoot?: string;
}

/**
 * Adds or replaces one repo entry in the configuration file at `configPath`,
 * creating the file when absent. The result is validated before it is written.
 */
export function registerRepo(configPath: string, entry: RegistrationEntry): HubConfig {
  let raw: Record<string, unknown> = { repos: [] };
  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigInvalidError(`Cannot parse ${configPath} as JSON`, { cause: err });
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigInvalidError(`${configPath} must contain a JSON object`);
    }
    raw = { ...parsed };
  }

  const existing: unknown[] = Array.isArray(raw.repos) ? raw.repos : [];
  const others = existing.filter(r => !(typeof r === 'object' && r !== null && 'name' in r && r.name === entry.name));
  const previous = existing.find(r => typeof r === 'object' && r !== null && 'name' in r && r.name === entry.name);

  const repo: Record<string, unknown> = typeof previous === 'object' && previous !== null ? { ...previous } : {};
  repo.name = entry.name;
  repo.path = entry.path;
  if (entry.dependsOn) repo.depends_on = entry.dependsOn;
  if (entry.canonicalRoot) {
    const prevCanonical = typeof repo.canonical === 'object' && repo.canonical !== null ? repo.canonical : {};
    repo.canonical = { ...prevCanonical, root: entry.canonicalRoot };
  }

  raw.repos = [...others, repo];
  const config = parseConfig(raw, configPath);
  writeJson(configPath, raw);
  return config;
}
