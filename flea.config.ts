import type { FleaConfig } from './packages/devshell/src/types'

const config: Partial<FleaConfig> = {
  // Shell resolved when `--name` is not given
  shell: 'default',

  // Output of `flea shell`: 'text', 'json' or 'shell'
  format: 'text',

  // Unfree dependencies stay admitted as the descriptor's package set allows
  allowUnfree: true,
}

export default config
