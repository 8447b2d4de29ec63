/**
 * Plain-text digest of a StructureIndex
 */

import type { StructureIndex } from '../types/index.js';

export const SUMMARY_MODULE_LIMIT = 10;

export function composeSummary(structure: StructureIndex): string {
  const modulePaths = Object.keys(structure.modules);
  const lines = [
    'Codebase Structure:',
    `- ${modulePaths.length} files analyzed`,
    `- ${Object.keys(structure.classes).length} classes`,
    `- ${Object.keys(structure.functions).length} functions`,
  ];

  if (modulePaths.length > 0) {
    lines.push('', 'Main Modules:');
    for (const modulePath of modulePaths.slice(0, SUMMARY_MODULE_LIMIT)) {
      lines.push(`  - ${modulePath}`);
    }
    if (modulePaths.length > SUMMARY_MODULE_LIMIT) {
      lines.push(`  ... and ${modulePaths.length - SUMMARY_MODULE_LIMIT} more`);
    }
  }

  return lines.join('\n');
}
