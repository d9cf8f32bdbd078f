import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { isMachineFile } from './loader';

export interface TemplateInfo {
  name: string;
  file: string;
  source: 'bundled' | 'user';
}

// src/cadence/templates in development, dist/cadence/templates once built
export const BUNDLED_TEMPLATES_DIR = path.join(__dirname, '..', 'templates');
export const USER_TEMPLATES_DIR = path.join(os.homedir(), '.config', 'cadence', 'machines');

/**
 * List machine templates, bundled first. Bundled names win over user
 * templates of the same name.
 */
export async function listTemplates(
  dirs: { bundled?: string; user?: string } = {}
): Promise<TemplateInfo[]> {
  const bundled = await readTemplates(dirs.bundled ?? BUNDLED_TEMPLATES_DIR, 'bundled');
  const user = await readTemplates(dirs.user ?? USER_TEMPLATES_DIR, 'user');
  const names = new Set(bundled.map(t => t.name));
  return [...bundled, ...user.filter(t => !names.has(t.name))];
}

/**
 * Resolve a template name (or a path to a machine file) to a file on disk
 */
export async function findTemplate(
  name: string,
  dirs: { bundled?: string; user?: string } = {}
): Promise<string | null> {
  if (name.includes('/') || name.includes('\\')) {
    return (await exists(name)) ? name : null;
  }
  const templates = await listTemplates(dirs);
  return templates.find(t => t.name === name)?.file ?? null;
}

async function readTemplates(dir: string, source: TemplateInfo['source']): Promise<TemplateInfo[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }
  return entries
    .filter(isMachineFile)
    .sort()
    .map(file => ({
      name: path.basename(file, path.extname(file)),
      file: path.join(dir, file),
      source,
    }));
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}
