import { BOOKING_METHODS } from '@plainbook/shared';
import { LedgerError } from '../errors.js';

/**
 * How an account decides which lots a reduction consumes.
 */
export type Booking = typeof BOOKING_METHODS[number];

export const DEFAULT_BOOKING: Booking = 'STRICT';

export function isBooking(token: string): token is Booking {
    return BOOKING_METHODS.some((method) => method === token);
}

/**
 * Parse a booking token. Accepts STRICT, STRICT_WITH_SIZE, NONE, AVERAGE, FIFO and LIFO;
 * throws UnknownBookingToken for anything else.
 */
export function parseBooking(token: string): Booking {
    if (!isBooking(token)) {
        throw new LedgerError(
            'UnknownBookingToken',
            `Unknown booking method "${token}"; expected one of ${BOOKING_METHODS.join(', ')}`
        );
    }
    return token;
}
