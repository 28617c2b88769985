/**
 * Identifier case conversion.
 *
 * Words split on any non-alphanumeric run and on camelCase boundaries:
 *   "fslmaths_Input-file" -> ["fslmaths", "Input", "file"]
 *   "HTTPServer2go"       -> ["HTTP", "Server2go"]
 */

export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter(word => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function snakeCase(name: string): string {
  return splitWords(name).map(w => w.toLowerCase()).join('_');
}

export function screamingSnakeCase(name: string): string {
  return splitWords(name).map(w => w.toUpperCase()).join('_');
}

export function pascalCase(name: string): string {
  return splitWords(name).map(capitalize).join('');
}

export function camelCase(name: string): string {
  const pascal = pascalCase(name);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}
