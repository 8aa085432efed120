/**
 * Regular expression for matching word boundaries including punctuation,
 * symbols, and whitespace characters.
 */
export const WORD_BOUNDARY = /[\p{P}\p{S}\s]+/u;

/**
 * Separator for multi-valued fields such as "Sci-Fi, Action".
 */
export const LIST_DELIMITER = /[,;|]/u;
