/**
 * Turn a stand-alone instruction message into a clause that continues
 * another message: the first paragraph break becomes a space and the first
 * letter is lower-cased.
 *
 * "It looks like X.\n\nDo Y." → "it looks like X. Do Y."
 */
export function composeSubordinateClause(message: string): string {
  const joined = message.replace("\n\n", " ");
  if (!joined) return joined;
  return joined[0].toLowerCase() + joined.slice(1);
}

/** Append `addition` to `message` as a "Furthermore, ..." continuation. */
export function appendFurthermore(message: string, addition: string): string {
  return `${message}\n\nFurthermore, ${composeSubordinateClause(addition)}`;
}
