import {
    createAmount,
    createBalance,
    createClose,
    createCommodity,
    createCostSpec,
    createCustom,
    createDocument,
    createEvent,
    createIncompleteAmount,
    createInclude,
    createNote,
    createOpen,
    createOption,
    createPad,
    createPlugin,
    createPosting,
    createPrice,
    createQuery,
    createTransaction,
    isLedgerError,
    parseAccount,
    parseBooking,
    parseCurrency,
    parseDate,
    parseDecimal,
    parseLedgerOptions,
    type Directive,
    type LedgerError,
    type Meta,
    type MetaValue,
    type Option,
    type Posting,
    type PostingPrice,
    type RootNames,
} from '@plainbook/core';
import type {
    DirectiveInput,
    LedgerDocument,
    MetaInput,
    MetaValueInput,
    PostingInput,
} from '@plainbook/shared';

/**
 * Outcome of turning a validated YAML document into core directives.
 * A directive that fails to build is left out and reported in `errors`.
 */
export interface ConvertedDocument {
    directives: Directive[];
    rootNames: RootNames;
    errors: LedgerError[];
}

/**
 * Option directives from the `options:` map. A list value gives one directive per entry.
 */
function optionsFromMap(document: LedgerDocument): Option[] {
    return Object.entries(document.options).flatMap(([name, value]) =>
        (Array.isArray(value) ? value : [value]).map((entry) => createOption({ name, value: entry }))
    );
}

/**
 * Option directives from the `options:` map, then those written in the directive list.
 */
export function collectOptions(document: LedgerDocument): Option[] {
    const listed = document.directives.flatMap((directive) =>
        directive.type === 'option' ? [createOption({ name: directive.name, value: directive.value })] : []
    );
    return [...optionsFromMap(document), ...listed];
}

function convertMetaValue(value: MetaValueInput, rootNames: RootNames): MetaValue {
    if (typeof value === 'string') return { kind: 'text', value };
    if (typeof value === 'boolean') return { kind: 'bool', value };
    if (typeof value === 'number') return { kind: 'number', value: parseDecimal(String(value)) };

    switch (value.kind) {
        case 'text':
            return { kind: 'text', value: value.value };
        case 'tag':
            return { kind: 'tag', value: value.value };
        case 'bool':
            return { kind: 'bool', value: value.value };
        case 'account':
            return { kind: 'account', value: parseAccount(value.value, rootNames) };
        case 'date':
            return { kind: 'date', value: parseDate(value.value) };
        case 'currency':
            return { kind: 'currency', value: parseCurrency(value.value) };
        case 'amount':
            return { kind: 'amount', value: createAmount(value.value.num, value.value.currency) };
        case 'number':
            return { kind: 'number', value: parseDecimal(value.value) };
    }
}

export function convertMeta(meta: MetaInput | undefined, rootNames: RootNames): Meta {
    const converted: Record<string, MetaValue> = {};
    for (const [key, value] of Object.entries(meta ?? {})) {
        converted[key] = convertMetaValue(value, rootNames);
    }
    return converted;
}

function convertPrice(posting: PostingInput): PostingPrice | undefined {
    if (posting.price !== undefined) {
        return { kind: 'per_unit', amount: createIncompleteAmount(posting.price) };
    }
    if (posting.total_price !== undefined) {
        return { kind: 'total', amount: createIncompleteAmount(posting.total_price) };
    }
    return undefined;
}

export function convertPosting(posting: PostingInput, rootNames: RootNames): Posting {
    const { cost } = posting;
    const price = convertPrice(posting);
    return createPosting({
        account: parseAccount(posting.account, rootNames),
        units: createIncompleteAmount(posting.units),
        ...(cost !== undefined
            ? {
                cost: createCostSpec({
                    numberPer: cost.number_per,
                    numberTotal: cost.number_total,
                    currency: cost.currency,
                    date: cost.date,
                    label: cost.label,
                    mergeCost: cost.merge_cost,
                }),
            }
            : {}),
        ...(price !== undefined ? { price } : {}),
        ...(posting.flag !== undefined ? { flag: posting.flag } : {}),
        meta: convertMeta(posting.meta, rootNames),
    });
}

/**
 * Build the core directive for one document entry. Throws LedgerError on invalid content.
 */
export function convertDirective(input: DirectiveInput, rootNames: RootNames): Directive {
    const account = (name: string) => parseAccount(name, rootNames);

    switch (input.type) {
        case 'open':
            return createOpen({
                date: input.date,
                meta: convertMeta(input.meta, rootNames),
                account: account(input.account),
                currencies: input.currencies,
                ...(input.booking !== undefined ? { booking: parseBooking(input.booking) } : {}),
            });
        case 'close':
            return createClose({ date: input.date, meta: convertMeta(input.meta, rootNames), account: account(input.account) });
        case 'commodity':
            return createCommodity({ date: input.date, meta: convertMeta(input.meta, rootNames), currency: input.currency });
        case 'transaction':
            return createTransaction({
                date: input.date,
                meta: convertMeta(input.meta, rootNames),
                flag: input.flag,
                ...(input.payee !== undefined ? { payee: input.payee } : {}),
                narration: input.narration,
                tags: input.tags,
                links: input.links,
                postings: input.postings.map((posting) => convertPosting(posting, rootNames)),
            });
        case 'balance':
            return createBalance({
                date: input.date,
                meta: convertMeta(input.meta, rootNames),
                account: account(input.account),
                amount: input.amount,
                ...(input.tolerance !== undefined ? { tolerance: input.tolerance } : {}),
            });
        case 'pad':
            return createPad({
                date: input.date,
                meta: convertMeta(input.meta, rootNames),
                account: account(input.account),
                sourceAccount: account(input.source_account),
            });
        case 'note':
            return createNote({
                date: input.date,
                meta: convertMeta(input.meta, rootNames),
                account: account(input.account),
                comment: input.comment,
            });
        case 'document':
            return createDocument({
                date: input.date,
                meta: convertMeta(input.meta, rootNames),
                account: account(input.account),
                path: input.path,
            });
        case 'price':
            return createPrice({
                date: input.date,
                meta: convertMeta(input.meta, rootNames),
                currency: input.currency,
                amount: input.amount,
            });
        case 'event':
            return createEvent({
                date: input.date,
                meta: convertMeta(input.meta, rootNames),
                name: input.name,
                description: input.description,
            });
        case 'query':
            return createQuery({ date: input.date, meta: convertMeta(input.meta, rootNames), name: input.name, query: input.query });
        case 'custom':
            return createCustom({ date: input.date, meta: convertMeta(input.meta, rootNames), name: input.name, args: input.args });
        case 'include':
            return createInclude({ filename: input.filename });
        case 'option':
            return createOption({ name: input.name, value: input.value });
        case 'plugin':
            return createPlugin({ module: input.module, ...(input.config !== undefined ? { config: input.config } : {}) });
    }
}

/**
 * Convert every entry of the document. Options from the `options:` map come first,
 * so that root renames apply to every account name in the document.
 * Invalid option values throw; any other failure drops its directive and is reported.
 */
export function convertDocument(document: LedgerDocument): ConvertedDocument {
    const { rootNames } = parseLedgerOptions(collectOptions(document)).options;

    const directives: Directive[] = optionsFromMap(document);
    const errors: LedgerError[] = [];

    document.directives.forEach((input) => {
        try {
            directives.push(convertDirective(input, rootNames));
        } catch (err) {
            if (!isLedgerError(err)) throw err;
            errors.push('date' in input ? err.withContext({ date: input.date }) : err);
        }
    });

    return { directives, rootNames, errors };
}
