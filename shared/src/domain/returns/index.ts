/**
 * Returns Domain
 *
 * @example
 * import { resolveReturnLines, toReturnLineRequests } from '@supportdesk/shared';
 *
 * const requests = toReturnLineRequests([2], [1]);
 * const result = resolveReturnLines(orderId, orderLines, requests ?? undefined);
 */

export * from './refund.js';
