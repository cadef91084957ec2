/**
 * Variable naming helpers
 */

/**
 * Storage key for a variable name: upper-cased, every other character kept.
 *
 * @example
 * storageKeyFor('database_url') // 'DATABASE_URL'
 */
export function storageKeyFor(name: string): string {
  return name.toUpperCase();
}

/**
 * Display name used in validation messages.
 *
 * @example
 * displayNameFor('database_url') // 'Database url'
 * displayNameFor('maxValue')     // 'Max value'
 */
export function displayNameFor(name: string): string {
  const words = name
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .split(/[_\-\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.toLowerCase());

  const phrase = words.join(' ');
  return phrase.charAt(0).toUpperCase() + phrase.slice(1);
}
