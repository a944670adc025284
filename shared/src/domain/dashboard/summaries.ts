/**
 * Dashboard Summaries
 *
 * Headline metrics for the table views. Computed from the rows the view
 * already fetched, so the numbers always agree with the filtered table.
 */

import type { Order, ReturnOrder, ShippingRate, SupportTicket } from '../../types/index.js';
import { round2 } from '../formatting.js';

export interface OrderSummaryStats {
    totalOrders: number;
    totalRevenue: number;
    averageOrderValue: number;
    pendingOrders: number;
}

export interface TicketSummaryStats {
    totalTickets: number;
    openTickets: number;
    resolvedTickets: number;
    urgentTickets: number;
}

export interface ReturnSummaryStats {
    totalReturns: number;
    pendingReturns: number;
    approvedReturns: number;
    totalRefunds: number;
}

export interface ShippingRateSummaryStats {
    totalRates: number;
    averageBaseRate: number;
    carriers: number;
}

function average(total: number, count: number): number {
    return count === 0 ? 0 : round2(total / count);
}

export function summarizeOrders(orders: readonly Order[]): OrderSummaryStats {
    const totalRevenue = round2(orders.reduce((sum, o) => sum + o.totalAmount, 0));
    return {
        totalOrders: orders.length,
        totalRevenue,
        averageOrderValue: average(totalRevenue, orders.length),
        pendingOrders: orders.filter(o => o.status === 'pending').length,
    };
}

export function summarizeTickets(tickets: readonly SupportTicket[]): TicketSummaryStats {
    return {
        totalTickets: tickets.length,
        openTickets: tickets.filter(t => t.status === 'open').length,
        resolvedTickets: tickets.filter(t => t.status === 'resolved').length,
        urgentTickets: tickets.filter(t => t.priority === 'urgent').length,
    };
}

export function summarizeReturns(returns: readonly ReturnOrder[]): ReturnSummaryStats {
    return {
        totalReturns: returns.length,
        pendingReturns: returns.filter(r => r.status === 'pending').length,
        approvedReturns: returns.filter(r => r.status === 'approved').length,
        totalRefunds: round2(returns.reduce((sum, r) => sum + r.refundTotalAmount, 0)),
    };
}

export function summarizeShippingRates(rates: readonly ShippingRate[]): ShippingRateSummaryStats {
    const totalBase = rates.reduce((sum, r) => sum + r.baseRate, 0);
    return {
        totalRates: rates.length,
        averageBaseRate: average(totalBase, rates.length),
        carriers: new Set(rates.map(r => r.carrier)).size,
    };
}
