/**
 * Dotenv-style file parser
 *
 * Handles the KEY=value files used to keep the reload credential
 * out of the shell history.
 */

/**
 * Parse `.env` content into a key/value map
 * Skips blank lines and `#` comments, accepts an optional `export ` prefix,
 * strips one pair of matching surrounding quotes.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  const lines = content.split(/\r?\n/);

  for (const line of lines) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const withoutExport = trimmed.startsWith('export ')
      ? trimmed.slice('export '.length).trimStart()
      : trimmed;

    const eq = withoutExport.indexOf('=');
    if (eq <= 0) {
      continue;
    }

    const key = withoutExport.slice(0, eq).trim();
    let value = withoutExport.slice(eq + 1).trim();

    // Remove quotes if present
    if (value.length >= 2 &&
        ((value.startsWith('"') && value.endsWith('"')) ||
         (value.startsWith("'") && value.endsWith("'")))) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}
