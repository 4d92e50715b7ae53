/**
 * Ledger constants
 */

export const DEFAULT_LEDGER_FILE = "data/posted_ids.txt";

export const MS_PER_HOUR = 3_600_000;

/**
 * Field separator of the flat-file ledger line: id \t postedAt \t channel
 */
export const LEDGER_FILE_SEPARATOR = "\t";
