/**
 * Constants for plainbook.
 */

/**
 * The five account roots, in canonical order.
 */
export const ACCOUNT_TYPES = ['Assets', 'Liabilities', 'Equity', 'Income', 'Expenses'] as const;

/**
 * Default root name per account type.
 * A ledger may rename any of them with the `name_<type>` options.
 */
export const DEFAULT_ROOT_NAMES = {
    Assets: 'Assets',
    Liabilities: 'Liabilities',
    Equity: 'Equity',
    Income: 'Income',
    Expenses: 'Expenses',
} as const;

/**
 * Option names that rename an account root.
 */
export const ROOT_NAME_OPTIONS = {
    name_assets: 'Assets',
    name_liabilities: 'Liabilities',
    name_equity: 'Equity',
    name_income: 'Income',
    name_expenses: 'Expenses',
} as const;

/**
 * Accepted booking method tokens.
 */
export const BOOKING_METHODS = ['STRICT', 'STRICT_WITH_SIZE', 'NONE', 'AVERAGE', 'FIFO', 'LIFO'] as const;

/**
 * Transaction and posting flags.
 */
export const FLAGS = {
    OKAY: '*',
    WARNING: '!',
    PADDING: 'P',
    SUMMARIZE: 'S',
    TRANSFER: 'T',
    CONVERSIONS: 'C',
    UNREALIZED: 'U',
    RETURNS: 'R',
    MERGING: 'M',
    FORECASTED: '#',
} as const;

export const FLAG_VALUES = ['*', '!', 'P', 'S', 'T', 'C', 'U', 'R', 'M', '#'] as const;

/**
 * Currency token grammar: capital first, capital or digit last, at most 24 chars.
 */
export const CURRENCY_PATTERN = /^[A-Z][A-Z0-9'._-]{0,22}[A-Z0-9]$/;

export const CURRENCY_MAX_LENGTH = 24;

/**
 * Decimal numbers travel as strings; never native numbers.
 */
export const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Same-day ordering of dated directives. Lower sorts first.
 * Opens and balance assertions take effect at the start of the day,
 * before that day's pads and transactions; documents and closes at its end.
 */
export const DIRECTIVE_PRIORITY = {
    open: -2,
    balance: -1,
    commodity: 0,
    pad: 0,
    transaction: 0,
    note: 0,
    price: 0,
    event: 0,
    query: 0,
    custom: 0,
    document: 1,
    close: 2,
} as const;

/**
 * Tolerance inference defaults.
 */
export const TOLERANCE = {
    INFERRED_MULTIPLIER: '0.5',
    WILDCARD_CURRENCY: '*',
} as const;

/**
 * Option names understood by the ledger options parser.
 */
export const KNOWN_OPTIONS = [
    'title',
    'operating_currency',
    'booking_method',
    'inferred_tolerance_multiplier',
    'inferred_tolerance_default',
    'infer_tolerance_from_cost',
    ...Object.keys(ROOT_NAME_OPTIONS),
] as const;

/**
 * Project configuration file looked up by the CLI.
 */
export const PROJECT_CONFIG_FILE = 'plainbook.yaml';
