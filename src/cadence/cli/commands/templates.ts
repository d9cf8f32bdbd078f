import { listTemplates } from '../../machine/templates';

/**
 * List available templates
 */
export async function listMachineTemplates(): Promise<number> {
  const templates = await listTemplates();

  console.log('');
  console.log('Available Templates');
  console.log('───────────────────');
  console.log('');

  if (templates.length === 0) {
    console.log('  (none)');
  }
  for (const template of templates) {
    const source = template.source === 'user' ? '  (user)' : '';
    console.log(`  ${template.name}${source}`);
  }

  console.log('');
  console.log('Usage: cadence init <template>');
  console.log('');

  return 0;
}
