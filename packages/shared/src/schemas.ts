/**
 * Zod schemas for plainbook input documents.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 * A YAML number is accepted and turned into its string form; quote it to keep
 * trailing zeros, which carry the precision used for tolerance inference.
 */

import { z } from 'zod';
import { BOOKING_METHODS, CURRENCY_PATTERN, DECIMAL_PATTERN, FLAGS, FLAG_VALUES } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Ledger date: YYYY-MM-DD, or YYYY/MM/DD.
 */
const ledgerDateString = z.string().regex(/^\d{4}[-/]\d{2}[-/]\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.union([
    z.string().regex(DECIMAL_PATTERN, 'Must be valid decimal string'),
    z.number().finite().transform((n) => String(n)),
]);

/**
 * Unsigned decimal, for costs, prices and tolerances.
 */
const unsignedDecimalString = decimalString.refine((s) => !s.startsWith('-'), 'Must not be negative');

const currency = z.string().regex(CURRENCY_PATTERN, 'Must be a currency token such as USD or HOOL');

const accountName = z.string().regex(/^[^:\s]+(:[^:\s]+)*$/, 'Must be a colon-separated account name');

const flag = z.enum(FLAG_VALUES);

export const BookingMethodSchema = z.enum(BOOKING_METHODS);

export type BookingMethodToken = z.infer<typeof BookingMethodSchema>;

// ============================================================================
// Amount Schemas
// ============================================================================

const AMOUNT_TEXT = /^(-?\d+(?:\.\d+)?)\s+(\S+)$/;
const INCOMPLETE_AMOUNT_TEXT = /^(-?\d+(?:\.\d+)?)?\s*([A-Z][A-Z0-9'._-]*[A-Z0-9])?$/;

/**
 * Complete amount written as "<number> <currency>", e.g. "-400.00 USD".
 */
export const AmountSchema = z
    .string()
    .trim()
    .regex(AMOUNT_TEXT, 'Must be "<number> <currency>"')
    .transform((text) => {
        const [, num, cur] = AMOUNT_TEXT.exec(text) ?? [];
        return { num: num ?? '', currency: cur ?? '' };
    })
    .refine((amount) => CURRENCY_PATTERN.test(amount.currency), 'Invalid currency');

export type AmountInput = z.infer<typeof AmountSchema>;

/**
 * Amount with the number, the currency, or both left out.
 * "12.50 USD", "12.50", "USD" and "" are all accepted.
 */
export const IncompleteAmountSchema = z
    .string()
    .trim()
    .regex(INCOMPLETE_AMOUNT_TEXT, 'Must be "[number] [currency]"')
    .transform((text): { num?: string; currency?: string } => {
        const match = INCOMPLETE_AMOUNT_TEXT.exec(text);
        const num = match?.[1];
        const currency = match?.[2];
        return {
            ...(num !== undefined ? { num } : {}),
            ...(currency !== undefined ? { currency } : {}),
        };
    });

export type IncompleteAmountInput = z.infer<typeof IncompleteAmountSchema>;

// ============================================================================
// Metadata Schemas
// ============================================================================

/**
 * Explicitly tagged metadata value, for values plain YAML cannot tell apart.
 */
export const TaggedMetaValueSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('text'), value: z.string() }),
    z.object({ kind: z.literal('account'), value: accountName }),
    z.object({ kind: z.literal('date'), value: ledgerDateString }),
    z.object({ kind: z.literal('currency'), value: currency }),
    z.object({ kind: z.literal('tag'), value: z.string().min(1) }),
    z.object({ kind: z.literal('bool'), value: z.boolean() }),
    z.object({ kind: z.literal('amount'), value: AmountSchema }),
    z.object({ kind: z.literal('number'), value: decimalString }),
]);

/**
 * Plain strings are text, booleans are bools, numbers are numbers.
 */
export const MetaValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), TaggedMetaValueSchema]);

export const MetaSchema = z.record(z.string().min(1), MetaValueSchema);

export type MetaInput = z.infer<typeof MetaSchema>;
export type MetaValueInput = z.infer<typeof MetaValueSchema>;

// ============================================================================
// Posting Schemas
// ============================================================================

/**
 * Cost filter or lot description. Every field is optional; `{}` is a valid spec.
 */
export const CostSpecSchema = z.object({
    number_per: unsignedDecimalString.optional(),
    number_total: unsignedDecimalString.optional(),
    currency: currency.optional(),
    date: ledgerDateString.optional(),
    label: z.string().optional(),
    merge_cost: z.boolean().default(false),
});

export type CostSpecInput = z.infer<typeof CostSpecSchema>;

/**
 * Single posting. `price` is per unit (`@`), `total_price` is for the whole posting (`@@`).
 */
export const PostingSchema = z
    .object({
        account: accountName,
        units: IncompleteAmountSchema.optional(),
        cost: CostSpecSchema.optional(),
        price: IncompleteAmountSchema.optional(),
        total_price: IncompleteAmountSchema.optional(),
        flag: flag.optional(),
        meta: MetaSchema.optional(),
    })
    .refine((p) => p.price === undefined || p.total_price === undefined, {
        message: 'A posting takes either price or total_price, not both',
    });

export type PostingInput = z.infer<typeof PostingSchema>;

// ============================================================================
// Directive Schemas
// ============================================================================

const dated = {
    date: ledgerDateString,
    meta: MetaSchema.optional(),
};

export const OpenSchema = z.object({
    type: z.literal('open'),
    ...dated,
    account: accountName,
    currencies: z.array(currency).default([]),
    booking: BookingMethodSchema.optional(),
});

export const CloseSchema = z.object({
    type: z.literal('close'),
    ...dated,
    account: accountName,
});

export const CommoditySchema = z.object({
    type: z.literal('commodity'),
    ...dated,
    currency,
});

export const TransactionSchema = z.object({
    type: z.literal('transaction'),
    ...dated,
    flag: flag.default(FLAGS.OKAY),
    payee: z.string().optional(),
    narration: z.string().default(''),
    tags: z.array(z.string().min(1)).default([]),
    links: z.array(z.string().min(1)).default([]),
    postings: z.array(PostingSchema).default([]),
});

export const BalanceSchema = z.object({
    type: z.literal('balance'),
    ...dated,
    account: accountName,
    amount: AmountSchema,
    tolerance: unsignedDecimalString.optional(),
});

export const PadSchema = z.object({
    type: z.literal('pad'),
    ...dated,
    account: accountName,
    source_account: accountName,
});

export const NoteSchema = z.object({
    type: z.literal('note'),
    ...dated,
    account: accountName,
    comment: z.string(),
});

export const DocumentSchema = z.object({
    type: z.literal('document'),
    ...dated,
    account: accountName,
    path: z.string().min(1),
});

export const PriceSchema = z.object({
    type: z.literal('price'),
    ...dated,
    currency,
    amount: AmountSchema,
});

export const EventSchema = z.object({
    type: z.literal('event'),
    ...dated,
    name: z.string().min(1),
    description: z.string(),
});

export const QuerySchema = z.object({
    type: z.literal('query'),
    ...dated,
    name: z.string().min(1),
    query: z.string().min(1),
});

export const CustomSchema = z.object({
    type: z.literal('custom'),
    ...dated,
    name: z.string().min(1),
    args: z.array(z.string()).default([]),
});

export const IncludeSchema = z.object({
    type: z.literal('include'),
    filename: z.string().min(1),
});

export const OptionSchema = z.object({
    type: z.literal('option'),
    name: z.string().min(1),
    value: z.string(),
});

export const PluginSchema = z.object({
    type: z.literal('plugin'),
    module: z.string().min(1),
    config: z.string().optional(),
});

export const DirectiveSchema = z.discriminatedUnion('type', [
    OpenSchema,
    CloseSchema,
    CommoditySchema,
    TransactionSchema,
    BalanceSchema,
    PadSchema,
    NoteSchema,
    DocumentSchema,
    PriceSchema,
    EventSchema,
    QuerySchema,
    CustomSchema,
    IncludeSchema,
    OptionSchema,
    PluginSchema,
]);

export type DirectiveInput = z.infer<typeof DirectiveSchema>;
export type TransactionInput = z.infer<typeof TransactionSchema>;

// ============================================================================
// Document Schemas
// ============================================================================

/**
 * Structured ledger document: option map plus a directive list.
 * A repeated option (operating_currency) takes a list.
 */
export const LedgerDocumentSchema = z.object({
    options: z.record(z.string().min(1), z.union([z.string(), z.array(z.string())])).default({}),
    directives: z.array(DirectiveSchema).default([]),
});

export type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;

/**
 * Project configuration (plainbook.yaml).
 */
export const ProjectConfigSchema = z.object({
    ledger: z.string().min(1).default('ledger.yaml'),
    booking_method: BookingMethodSchema.optional(),
    tolerance: z.record(z.string().min(1), unsignedDecimalString).default({}),
    strict: z.boolean().default(false),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
