import * as path from 'path';
import { DEFAULT_MACHINE_BASENAME, DEFAULT_TEMPLATE } from '../../config/constants';
import { isMachineFile } from '../machine/loader';
import { exists, findTemplate } from '../machine/templates';

const LOCAL_EXTENSIONS = ['.yaml', '.yml', '.puml'];

/**
 * Pick the machine file for a command.
 *
 * An explicit target is a path when it looks like one, otherwise a template
 * name. Without a target: `./machine.{yaml,yml,puml}`, then the default template.
 */
export async function resolveMachineFile(cwd: string, target?: string): Promise<string> {
  if (target) {
    if (target.includes('/') || target.includes('\\') || isMachineFile(target)) {
      return path.resolve(cwd, target);
    }
    const template = await findTemplate(target);
    if (!template) {
      throw new Error(`Machine not found: ${target}`);
    }
    return template;
  }

  for (const ext of LOCAL_EXTENSIONS) {
    const local = path.join(cwd, `${DEFAULT_MACHINE_BASENAME}${ext}`);
    if (await exists(local)) {
      return local;
    }
  }

  const fallback = await findTemplate(DEFAULT_TEMPLATE);
  if (!fallback) {
    throw new Error(`Bundled template '${DEFAULT_TEMPLATE}' is missing`);
  }
  return fallback;
}
