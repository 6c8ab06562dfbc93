import { ValidationError } from '../../utils/errors.js';

/**
 * Named installers. They differ only in the URL handed to the runner.
 */
export interface InstallerPreset {
  name: string;
  url: string;
  description: string;
}

export const INSTALLER_PRESETS = {
  mambaforge: {
    name: 'mambaforge',
    url: 'https://github.com/jaimergp/miniforge/releases/latest/download/Mambaforge-colab-Linux-x86_64.sh',
    description: 'conda-forge distribution with mamba, built against the notebook host interpreter'
  },
  miniforge: {
    name: 'miniforge',
    url: 'https://github.com/jaimergp/miniforge/releases/latest/download/Miniforge-colab-Linux-x86_64.sh',
    description: 'conda-forge distribution without mamba, built against the notebook host interpreter'
  },
  miniconda: {
    name: 'miniconda',
    url: 'https://repo.anaconda.com/miniconda/Miniconda3-4.5.4-Linux-x86_64.sh',
    description: 'Miniconda 4.5.4 (frozen, last release for Python 3.6)'
  },
  anaconda: {
    name: 'anaconda',
    url: 'https://repo.anaconda.com/archive/Anaconda3-5.2.0-Linux-x86_64.sh',
    description: 'Anaconda 5.2.0 (frozen, last release for Python 3.6)'
  }
} as const satisfies Record<string, InstallerPreset>;

export type PresetName = keyof typeof INSTALLER_PRESETS;

export const DEFAULT_PRESET: PresetName = 'mambaforge';

export function isPresetName(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(INSTALLER_PRESETS, name);
}

export function listPresets(): InstallerPreset[] {
  return Object.values(INSTALLER_PRESETS);
}

export function getPreset(name: string = DEFAULT_PRESET): InstallerPreset {
  if (!isPresetName(name)) {
    const valid = Object.keys(INSTALLER_PRESETS).join(', ');
    throw new ValidationError(`Unknown installer preset '${name}'. Valid presets: ${valid}`, { name });
  }
  return INSTALLER_PRESETS[name];
}
