const PARENTHETICAL_PATTERN = /^(.+?)\s*\((.+?)\)\s*$/;

/**
 * Moves a trailing parenthetical qualifier to the front of the item name,
 * e.g. "ginger (fresh)" -> "fresh ginger". Other names pass through unchanged.
 */
export const cleanSearchQuery = (itemName: string): string => {
  const match = PARENTHETICAL_PATTERN.exec(itemName);
  if (!match) {
    return itemName;
  }
  const [, base, modifier] = match;
  return `${modifier.trim()} ${base.trim()}`;
};
