import { Command } from 'commander';

import { createCliExecutionContext } from '../cli/context.js';
import { DEFAULT_PRESET, listPresets } from '../core/install/presets.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { withErrorHandling } from '../utils/errors.js';

export function setupPresetsCommand(program: Command): void {
  program
    .command('presets')
    .description('List the installer presets')
    .action(withErrorHandling(async () => {
      const out = resolveOutput(createCliExecutionContext());
      const lines = listPresets().map((preset) => {
        const marker = preset.name === DEFAULT_PRESET ? ' (default)' : '';
        return `${preset.name}${marker}\n    ${preset.description}\n    ${preset.url}`;
      });
      out.note(lines.join('\n'), 'Installer presets');
    }));
}
