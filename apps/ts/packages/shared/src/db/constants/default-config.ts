/**
 * Default configurator settings
 *
 * Seeded into the `config` table when a key is absent. Values are stored as
 * text, the way the configurator itself writes them.
 */

export interface DefaultConfigEntry {
  key: string;
  value: string;
}

export const DEFAULT_CONFIG_ENTRIES: readonly DefaultConfigEntry[] = [
  { key: 'prompt_update_check', value: '1' },
  { key: 'update_check', value: '0' },
  { key: 'startup_minimized', value: '0' },
  { key: 'startup_autoconnect', value: '0' },
  { key: 'smart_layers_enabled', value: '1' },
  { key: 'api_enabled', value: '0' },
  { key: 'api_port', value: '50051' },
];
