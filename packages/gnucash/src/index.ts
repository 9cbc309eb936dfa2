/**
 * @payledger/gnucash — GnuCash multi-split CSV output.
 */

export { formatGnuCashCsv, toGnuCashRows, withinWindow, GNUCASH_COLUMNS } from "./multi-split.js";
export type { ExportWindow, GnuCashRow } from "./multi-split.js";
