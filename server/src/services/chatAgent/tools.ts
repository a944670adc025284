/**
 * Chat Agent - Tool definitions, classification, system prompt, and constants
 */

import type Anthropic from '@anthropic-ai/sdk';
import { SHIPPING_SERVICE_LEVELS, TICKET_PRIORITIES } from '@supportdesk/shared';

// ============================================
// CONSTANTS
// ============================================

/** Model calls per user turn, tool rounds included */
export const MAX_LOOP_ITERATIONS = 5;

export const MAX_ITERATIONS_REPLY =
    "I apologize, but I'm having trouble completing this request. Let me create a support ticket for you.";

export const EMPTY_RESPONSE_REPLY = "I apologize, but I'm having trouble generating a response.";

export const MISSING_API_KEY_MESSAGE = 'Anthropic API key is not configured.';

// ============================================
// SYSTEM PROMPT
// ============================================

export const SYSTEM_PROMPT = `You are a customer support agent for a small online electronics store.

GOALS:
- Answer questions about products, stock, pricing, features, warranty and returns.
- Help customers check the status of their orders.
- Estimate shipping costs and delivery times.
- Follow the store procedures for troubleshooting and escalation.
- When an issue needs a person, open a support ticket.

RULES:
- Do not invent order status or product details. Use the tools whenever you need facts.
- NEVER make up customer data such as names, email addresses or phone numbers.
- When a customer wants to place an order, ALWAYS call draft_order first to see which details are still missing.
- Only call create_order after draft_order reports the draft is ready and the customer has confirmed it.
- If information is missing, ask the customer for it in a friendly, conversational way.
- Keep responses concise and helpful.`;

export const WELCOME_MESSAGE = `Hello! Welcome to customer support. I can help you with:

- Order tracking and status
- Product information and browsing
- Shipping estimates and options
- Returns and refunds
- Support tickets for issues that need a person
- Help-centre articles

How can I help you today?`;

// ============================================
// TOOL DEFINITIONS (Anthropic format)
// ============================================

const customerFields = {
    customerName: { type: 'string', description: 'Full name of the customer' },
    customerEmail: { type: 'string', description: 'Email address of the customer' },
    customerPhone: { type: 'string', description: 'Phone number of the customer' },
    shippingAddress: { type: 'string', description: 'Complete shipping address including street, city, state and ZIP' },
    productIds: { type: 'array', items: { type: 'integer' }, description: 'IDs of the products to order' },
    quantities: {
        type: 'array',
        items: { type: 'integer' },
        description: 'Quantity for each product, in the same order as productIds',
    },
};

export const TOOLS: Anthropic.Messages.Tool[] = [
    // --- Read-only tools ---
    {
        name: 'draft_order',
        description: 'Check which order details have been collected so far and which are still missing. '
            + 'When everything is present, prices the order and checks stock. Call this before create_order.',
        input_schema: {
            type: 'object' as const,
            properties: customerFields,
            required: [],
        },
    },
    {
        name: 'order_status',
        description: 'Check the status of an existing order and list its items.',
        input_schema: {
            type: 'object' as const,
            properties: {
                orderId: { type: 'integer', description: 'The order number' },
            },
            required: ['orderId'],
        },
    },
    {
        name: 'product_catalog',
        description: 'Browse the product catalogue, optionally filtered by category or a search term.',
        input_schema: {
            type: 'object' as const,
            properties: {
                category: {
                    type: 'string',
                    description: 'Category, e.g. headphone, camera, monitor, keyboard, speaker, accessory',
                },
                searchQuery: { type: 'string', description: 'Text to search in product names and descriptions' },
            },
            required: [],
        },
    },
    {
        name: 'check_inventory',
        description: 'Check the current stock level of a product.',
        input_schema: {
            type: 'object' as const,
            properties: {
                productId: { type: 'integer', description: 'The product ID' },
            },
            required: ['productId'],
        },
    },
    {
        name: 'estimate_shipping',
        description: 'Estimate shipping cost and delivery time for a destination ZIP code and package weight.',
        input_schema: {
            type: 'object' as const,
            properties: {
                destinationZip: { type: 'string', description: 'Destination ZIP code' },
                weightLbs: { type: 'number', description: 'Package weight in pounds' },
                serviceLevel: {
                    type: 'string',
                    enum: [...SHIPPING_SERVICE_LEVELS],
                    description: 'Limit the estimate to one service level',
                },
            },
            required: ['destinationZip', 'weightLbs'],
        },
    },
    {
        name: 'search_knowledge_base',
        description: 'Search help-centre articles about policies, warranty, payments and shipping.',
        input_schema: {
            type: 'object' as const,
            properties: {
                query: { type: 'string', description: 'What the customer wants to know' },
            },
            required: ['query'],
        },
    },

    // --- Mutating tools ---
    {
        name: 'create_order',
        description: 'Place an order. Only call after draft_order reports the draft is ready and the customer confirmed it.',
        input_schema: {
            type: 'object' as const,
            properties: customerFields,
            required: ['customerName', 'customerEmail', 'customerPhone', 'shippingAddress', 'productIds', 'quantities'],
        },
    },
    {
        name: 'create_support_ticket',
        description: 'Open a support ticket for an issue that needs a person to follow up.',
        input_schema: {
            type: 'object' as const,
            properties: {
                customerName: { type: 'string', description: 'Full name of the customer' },
                customerEmail: { type: 'string', description: 'Email address of the customer' },
                issueDescription: { type: 'string', description: 'Clear description of the problem' },
                priority: {
                    type: 'string',
                    enum: [...TICKET_PRIORITIES],
                    description: 'Ticket priority (defaults to medium)',
                },
                productId: { type: 'integer', description: 'Product the issue is about, if any' },
            },
            required: ['customerName', 'issueDescription'],
        },
    },
    {
        name: 'initiate_return',
        description: 'Start a return for a whole order or for specific items on it.',
        input_schema: {
            type: 'object' as const,
            properties: {
                orderId: { type: 'integer', description: 'The order number' },
                returnReason: { type: 'string', description: 'Why the customer is returning the items' },
                productIds: {
                    type: 'array',
                    items: { type: 'integer' },
                    description: 'Products to return; omit to return the whole order',
                },
                quantities: {
                    type: 'array',
                    items: { type: 'integer' },
                    description: 'Quantity per product in productIds; each defaults to 1',
                },
            },
            required: ['orderId', 'returnReason'],
        },
    },
];

// ============================================
// TOOL CLASSIFICATION
// ============================================

export const TOOL_NAMES = [
    'draft_order',
    'order_status',
    'product_catalog',
    'check_inventory',
    'estimate_shipping',
    'search_knowledge_base',
    'create_order',
    'create_support_ticket',
    'initiate_return',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
    return (TOOL_NAMES as readonly string[]).includes(name);
}

export const MUTATING_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>([
    'create_order',
    'create_support_ticket',
    'initiate_return',
]);
