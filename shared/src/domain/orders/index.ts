/**
 * Orders Domain Layer
 *
 * Pricing and draft-order validation shared by the chat tools and the
 * data-access layer.
 */

export * from './pricing.js';
export * from './draftOrder.js';
