// Schemas
export {
    BookingMethodSchema,
    AmountSchema,
    IncompleteAmountSchema,
    TaggedMetaValueSchema,
    MetaValueSchema,
    MetaSchema,
    CostSpecSchema,
    PostingSchema,
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
    DirectiveSchema,
    LedgerDocumentSchema,
    ProjectConfigSchema,
} from './schemas.js';

// Types
export type {
    BookingMethodToken,
    AmountInput,
    IncompleteAmountInput,
    MetaInput,
    MetaValueInput,
    CostSpecInput,
    PostingInput,
    DirectiveInput,
    TransactionInput,
    LedgerDocument,
    ProjectConfig,
} from './schemas.js';

// Constants
export {
    ACCOUNT_TYPES,
    DEFAULT_ROOT_NAMES,
    ROOT_NAME_OPTIONS,
    BOOKING_METHODS,
    FLAGS,
    FLAG_VALUES,
    CURRENCY_PATTERN,
    CURRENCY_MAX_LENGTH,
    DECIMAL_PATTERN,
    DIRECTIVE_PRIORITY,
    TOLERANCE,
    KNOWN_OPTIONS,
    PROJECT_CONFIG_FILE,
} from './constants.js';
