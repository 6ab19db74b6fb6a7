import { describe, it, expect } from 'vitest';
import { DEFAULT_BOOKING, isBooking, parseBooking } from '../../src/booking/method.js';
import { thrownCode } from '../helpers.js';

describe('parseBooking', () => {
    it('accepts every booking token', () => {
        for (const token of ['STRICT', 'STRICT_WITH_SIZE', 'NONE', 'AVERAGE', 'FIFO', 'LIFO']) {
            expect(parseBooking(token)).toBe(token);
        }
    });

    it('is case sensitive', () => {
        expect(isBooking('fifo')).toBe(false);
        expect(thrownCode(() => parseBooking('fifo'))).toBe('UnknownBookingToken');
    });

    it('rejects unknown tokens', () => {
        expect(thrownCode(() => parseBooking('HIFO'))).toBe('UnknownBookingToken');
    });

    it('defaults to STRICT', () => {
        expect(DEFAULT_BOOKING).toBe('STRICT');
    });
});
