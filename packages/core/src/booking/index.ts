/**
 * Booking module: booking methods and the lot resolver.
 */

export { DEFAULT_BOOKING, isBooking, parseBooking } from './method.js';
export type { Booking } from './method.js';
export { bookPosting, bookReduction, bookAugmentation } from './resolve.js';
export type { BookingRequest, BookedLeg, Booked } from './types.js';
