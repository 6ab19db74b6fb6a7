/**
 * Directive module: the directive sum type, its builders and its rendering.
 */

export { isDated } from './types.js';
export type {
    Open,
    Close,
    Commodity,
    Transaction,
    Balance,
    Pad,
    Note,
    Document,
    Price,
    Event,
    Query,
    Custom,
    Include,
    Option,
    Plugin,
    Unsupported,
    DatedKind,
    DatedDirectiveType,
    UndatedKind,
    Directive,
    DirectiveType,
} from './types.js';
export {
    createOpen,
    createClose,
    createCommodity,
    createTransaction,
    createBalance,
    createPad,
    createNote,
    createDocument,
    createPrice,
    createEvent,
    createQuery,
    createCustom,
    createInclude,
    createOption,
    createPlugin,
    createUnsupported,
} from './builders.js';
export type {
    OpenOptions,
    CloseOptions,
    CommodityOptions,
    TransactionOptions,
    BalanceOptions,
    PadOptions,
    NoteOptions,
    DocumentOptions,
    PriceOptions,
    EventOptions,
    QueryOptions,
    CustomOptions,
} from './builders.js';
export { formatDirective } from './format.js';
