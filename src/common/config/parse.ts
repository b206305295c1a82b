/* src/common/config/parse.ts
 * Config text -> document. The file extension picks the syntax.
 */
import YAML from 'yaml';

export type ConfigSyntax = 'json' | 'yaml';

export const syntaxOf = (p: string): ConfigSyntax =>
  p.toLowerCase().endsWith('.json') ? 'json' : 'yaml';

/**
 * Parse configuration text: JSON for ".json" files, YAML otherwise.
 * An empty YAML document parses to `null`.
 */
export const parseText = (p: string, text: string): unknown =>
  syntaxOf(p) === 'json' ? JSON.parse(text) : YAML.parse(text);
