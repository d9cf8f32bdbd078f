import { parse as parseYaml } from 'yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { MachineDocumentSchema } from './schemas';
import { compileMachine } from './compiler';
import { parsePlantUml } from './plantuml';
import { ActionRegistry, createActionRegistry } from '../engine/actions';
import { GuardRegistry, createGuardRegistry } from '../engine/guards';
import { MachineDefinitionError } from '../errors';
import type { MachineDefinition, MachineDocument } from '../types';

export type MachineFormat = 'yaml' | 'plantuml';

const FORMATS: Record<string, MachineFormat> = {
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.puml': 'plantuml',
  '.plantuml': 'plantuml',
};

export function detectFormat(filePath: string): MachineFormat {
  const ext = path.extname(filePath).toLowerCase();
  const format = FORMATS[ext];
  if (!format) {
    throw new Error(
      `Unsupported machine file '${path.basename(filePath)}'. ` +
      `Expected one of: ${Object.keys(FORMATS).join(', ')}`
    );
  }
  return format;
}

export function isMachineFile(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() in FORMATS;
}

export class MachineLoader {
  private registry: ActionRegistry;
  private guards: GuardRegistry;

  constructor(registry: ActionRegistry = createActionRegistry(), guards: GuardRegistry = createGuardRegistry()) {
    this.registry = registry;
    this.guards = guards;
  }

  /**
   * Load, validate and compile a machine file
   */
  async load(filePath: string): Promise<MachineDefinition> {
    if (!(await fileExists(filePath))) {
      throw new Error(`Machine file not found: ${filePath}`);
    }
    const format = detectFormat(filePath);
    const content = await fs.readFile(filePath, 'utf-8');
    const name = path.basename(filePath, path.extname(filePath));
    return this.parse(content, format, name);
  }

  parse(content: string, format: MachineFormat, fallbackName?: string): MachineDefinition {
    const doc = this.parseDocument(content, format, fallbackName);
    return compileMachine(doc, { registry: this.registry, guards: this.guards, name: fallbackName });
  }

  /**
   * Parse and schema-check a document without compiling it
   */
  parseDocument(content: string, format: MachineFormat, fallbackName?: string): MachineDocument {
    const data = format === 'yaml' ? parseYamlDocument(content) : parsePlantUml(content, fallbackName);

    const result = MachineDocumentSchema.safeParse(data);
    if (!result.success) {
      throw new MachineDefinitionError(
        'Invalid machine document',
        result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return result.data;
  }
}

function parseYamlDocument(content: string): unknown {
  try {
    return parseYaml(content);
  } catch (err) {
    throw new MachineDefinitionError('Invalid YAML', [err instanceof Error ? err.message : String(err)]);
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
