/**
 * Known top-level config fields.
 * Used to detect unknown fields that might be typos or unsupported options.
 */
const KNOWN_CONFIG_FIELDS = new Set([
  'configVersion',
  'whitelistPath',
  'excludePrefixes',
  'source',
  'root',
  'extensions',
  'maxFileSize',
  'persist',
  'dedupePerLine',
]);

export interface ConfigValidationWarning {
  field: string;
  message: string;
  code: 'UNKNOWN_FIELD' | 'EMPTY_EXCLUDE_PREFIX_LIST';
}

/**
 * Returns warnings for config keys that the schema would silently drop
 * and for settings that are valid but probably unintended.
 *
 * @param raw - The merged, not yet validated config object
 * @param source - Label used in messages, e.g. the config file path
 */
export function findConfigWarnings(
  raw: Record<string, unknown>,
  source: string,
): ConfigValidationWarning[] {
  const warnings: ConfigValidationWarning[] = [];

  for (const field of Object.keys(raw)) {
    if (!KNOWN_CONFIG_FIELDS.has(field)) {
      warnings.push({
        field,
        message: `Unknown config field '${field}' in ${source} is ignored`,
        code: 'UNKNOWN_FIELD',
      });
    }
  }

  const excludes = raw['excludePrefixes'];
  if (Array.isArray(excludes) && excludes.length === 0) {
    warnings.push({
      field: 'excludePrefixes',
      message: `No exclude prefixes configured in ${source}; translation and wordlist files will be scanned`,
      code: 'EMPTY_EXCLUDE_PREFIX_LIST',
    });
  }

  return warnings;
}
