/**
 * Chat Agent - Mutating tool executor functions
 *
 * Each runs its writes in one transaction through the data-access layer.
 */

import {
    createOrderArgsSchema,
    createSupportTicketArgsSchema,
    formatCurrency,
    initiateReturnArgsSchema,
    toReturnLineRequests,
} from '@supportdesk/shared';
import { createOrder, createReturn, createSupportTicket } from '../../db/queries/index.js';
import { ValidationError } from '../../utils/errors.js';
import { chatLogger as log } from '../../utils/logger.js';
import { defineTool } from './defineTool.js';

export const execCreateOrder = defineTool(createOrderArgsSchema, async (args, { db }) => {
    const order = await createOrder(db, {
        customerName: args.customerName,
        customerEmail: args.customerEmail,
        customerPhone: args.customerPhone,
        shippingAddress: args.shippingAddress,
        items: args.productIds.map((productId, i) => ({ productId, quantity: args.quantities[i] })),
    });

    log.info({ orderId: order.id, totalAmount: order.totalAmount }, 'Order created from chat');

    return {
        success: true,
        message: `Order #${order.id} created successfully for ${order.customerName}. Total: ${formatCurrency(order.totalAmount)}`,
        orderId: order.id,
        totalAmount: order.totalAmount,
        order,
    };
});

export const execCreateSupportTicket = defineTool(createSupportTicketArgsSchema, async (args, { db }) => {
    const ticket = await createSupportTicket(db, {
        customerName: args.customerName,
        customerEmail: args.customerEmail,
        issueDescription: args.issueDescription,
        priority: args.priority,
        productId: args.productId,
    });

    log.info({ ticketId: ticket.id, priority: ticket.priority }, 'Support ticket created from chat');

    return {
        success: true,
        message: `Support ticket #${ticket.id} created with ${ticket.priority} priority`,
        ticketId: ticket.id,
        ticket,
    };
});

export const execInitiateReturn = defineTool(initiateReturnArgsSchema, async (args, { db }) => {
    const lines = toReturnLineRequests(args.productIds, args.quantities);
    if (lines === null) {
        throw new ValidationError('Product IDs and quantities must have the same length');
    }

    const created = await createReturn(db, {
        orderId: args.orderId,
        reason: args.returnReason,
        lines,
    });

    log.info({ returnId: created.id, orderId: created.orderId, items: created.items.length }, 'Return created from chat');

    return {
        success: true,
        message: `Return request #${created.id} created for order #${created.orderId}. `
            + `Refund total: ${formatCurrency(created.refundTotalAmount)}`,
        returnId: created.id,
        refundTotalAmount: created.refundTotalAmount,
        items: created.items,
    };
});
