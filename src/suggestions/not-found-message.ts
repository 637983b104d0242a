/**
 * User-facing wording for failed lookups.
 *
 * Every miss shown to a user either lists suggestions or says that none were found.
 */
export function describeNotFound(
  entity: string,
  query: string,
  where: string,
  suggestions: readonly string[]
): string {
  const head = `No ${entity} matching "${query}" was found in ${where}.`;

  if (suggestions.length === 0) {
    return `${head} No similar results found.`;
  }

  return `${head} Maybe you meant:${suggestions.map((s) => `\n  - ${s}`).join('')}`;
}
