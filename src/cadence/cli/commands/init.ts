import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_MACHINE_BASENAME, DEFAULT_TEMPLATE } from '../../../config/constants';
import { exists, findTemplate } from '../../machine/templates';

/**
 * Copy a template into the working directory as ./machine.<ext>
 */
export async function initMachine(cwd: string, templateName: string = DEFAULT_TEMPLATE): Promise<number> {
  const templatePath = await findTemplate(templateName);
  if (!templatePath) {
    console.error(`Error: Template not found: ${templateName}`);
    console.error('Run "cadence templates" to list available templates.');
    return 1;
  }

  const targetPath = path.join(cwd, `${DEFAULT_MACHINE_BASENAME}${path.extname(templatePath)}`);
  if (await exists(targetPath)) {
    console.error(`Error: ${path.basename(targetPath)} already exists`);
    console.error('Delete it first to reinitialize.');
    return 1;
  }

  await fs.copyFile(templatePath, targetPath);

  console.log(`Initialized machine from template: ${templateName}`);
  console.log(`  File: ${targetPath}`);
  console.log('');
  console.log('Next steps:');
  console.log('  cadence inspect    - View states and transitions');
  console.log('  cadence run        - Run the machine');

  return 0;
}
