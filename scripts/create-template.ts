#!/usr/bin/env tsx
import path from 'node:path';
import { DEFAULT_TEMPLATE_PATH } from '../server/env';
import { writeScheduleTemplate } from '../server/services/scheduleTemplate';

async function main() {
  const target = path.resolve(process.cwd(), process.argv[2] ?? process.env.TEMPLATE_PATH ?? DEFAULT_TEMPLATE_PATH);
  await writeScheduleTemplate(target);
  console.log(`✅ Template written to ${target}`);
}

main().catch((error) => {
  console.error('❌ Failed to write template:', error);
  process.exit(1);
});
