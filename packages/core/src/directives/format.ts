/**
 * Canonical text rendering of directives.
 *
 * Output follows the ledger's textual grammar closely enough to read back,
 * but alignment and whitespace of the original input are not preserved.
 */

import { formatAccount, type Account, type RootNames } from '../account/account.js';
import { formatAmount } from '../primitives/amount.js';
import { formatMeta } from '../posting/meta.js';
import { formatPosting } from '../posting/posting.js';
import type { Directive, Transaction } from './types.js';

const META_INDENT = '  ';

function quote(text: string): string {
    return JSON.stringify(text);
}

function transactionHeader(txn: Transaction): string {
    const parts = [txn.date, txn.flag];
    if (txn.payee !== undefined) parts.push(quote(txn.payee));
    parts.push(quote(txn.narration));
    for (const tag of txn.tags) parts.push(`#${tag}`);
    for (const link of txn.links) parts.push(`^${link}`);
    return parts.join(' ');
}

/**
 * Render the first line of a directive (without metadata or postings).
 */
function headline(directive: Directive, rootNames?: RootNames): string {
    const account = (a: Account): string => formatAccount(a, rootNames);

    switch (directive.type) {
        case 'open': {
            let line = `${directive.date} open ${account(directive.account)}`;
            if (directive.currencies.length > 0) line += ` ${directive.currencies.join(',')}`;
            if (directive.booking !== undefined) line += ` ${quote(directive.booking)}`;
            return line;
        }
        case 'close':
            return `${directive.date} close ${account(directive.account)}`;
        case 'commodity':
            return `${directive.date} commodity ${directive.currency}`;
        case 'transaction':
            return transactionHeader(directive);
        case 'balance': {
            const { num, currency } = directive.amount;
            const tolerance = directive.tolerance !== undefined ? ` ~ ${directive.tolerance}` : '';
            return `${directive.date} balance ${account(directive.account)} ${num}${tolerance} ${currency}`;
        }
        case 'pad':
            return `${directive.date} pad ${account(directive.account)} ${account(directive.sourceAccount)}`;
        case 'note':
            return `${directive.date} note ${account(directive.account)} ${quote(directive.comment)}`;
        case 'document':
            return `${directive.date} document ${account(directive.account)} ${quote(directive.path)}`;
        case 'price':
            return `${directive.date} price ${directive.currency} ${formatAmount(directive.amount)}`;
        case 'event':
            return `${directive.date} event ${quote(directive.name)} ${quote(directive.description)}`;
        case 'query':
            return `${directive.date} query ${quote(directive.name)} ${quote(directive.query)}`;
        case 'custom':
            return [`${directive.date} custom`, quote(directive.name), ...directive.args.map(quote)].join(' ');
        case 'include':
            return `include ${quote(directive.filename)}`;
        case 'option':
            return `option ${quote(directive.name)} ${quote(directive.value)}`;
        case 'plugin':
            return directive.config !== undefined
                ? `plugin ${quote(directive.module)} ${quote(directive.config)}`
                : `plugin ${quote(directive.module)}`;
        case 'unsupported':
            return directive.text;
    }
}

/**
 * Render a directive as ledger text, metadata and postings included.
 */
export function formatDirective(directive: Directive, rootNames?: RootNames): string {
    const lines = [headline(directive, rootNames)];
    if ('meta' in directive) {
        lines.push(...formatMeta(directive.meta, META_INDENT, rootNames));
    }
    if (directive.type === 'transaction') {
        for (const posting of directive.postings) {
            lines.push(...formatPosting(posting, rootNames));
        }
    }
    return lines.join('\n');
}
