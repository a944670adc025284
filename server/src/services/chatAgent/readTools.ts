/**
 * Chat Agent - Read-only tool executor functions
 */

import {
    checkInventoryArgsSchema,
    draftOrderArgsSchema,
    estimateShippingArgsSchema,
    estimateShipping,
    evaluateDraftOrder,
    formatCurrency,
    orderStatusArgsSchema,
    productCatalogArgsSchema,
    searchKnowledgeBaseArgsSchema,
} from '@supportdesk/shared';
import { getCatalog, getOrder, getProductById, getProducts, findShippingRates } from '../../db/queries/index.js';
import { BusinessLogicError, NotFoundError } from '../../utils/errors.js';
import { defineTool, fail } from './defineTool.js';

export const execDraftOrder = defineTool(draftOrderArgsSchema, async (args, { db }) => {
    const catalog = await getCatalog(db, args.productIds ?? []);
    const result = evaluateDraftOrder(args, catalog);

    if (!result.success) {
        return fail(result.error);
    }

    return {
        success: true,
        message: result.message,
        readyToOrder: result.readyToOrder,
        providedFields: result.providedFields,
        missingFields: result.missingFields,
        ...(result.readyToOrder && {
            orderSummary: result.orderSummary,
            nextStep: result.nextStep,
        }),
    };
});

export const execOrderStatus = defineTool(orderStatusArgsSchema, async ({ orderId }, { db }) => {
    const order = await getOrder(db, orderId);
    if (!order) {
        throw new NotFoundError(`Order #${orderId} not found`, 'Order', orderId);
    }

    return {
        success: true,
        message: `Order #${order.id} status: ${order.status}`,
        order,
    };
});

export const execProductCatalog = defineTool(productCatalogArgsSchema, async ({ category, searchQuery }, { db }) => {
    const products = await getProducts(db, { category, search: searchQuery });

    return {
        success: true,
        message: `Found ${products.length} product(s)`,
        count: products.length,
        products: products.map(p => ({
            id: p.id,
            name: p.name,
            category: p.category,
            price: p.price,
            description: p.description,
            specifications: p.specifications,
            inStock: p.stockQuantity > 0,
        })),
    };
});

export const execCheckInventory = defineTool(checkInventoryArgsSchema, async ({ productId }, { db }) => {
    const product = await getProductById(db, productId);
    if (!product) {
        throw new NotFoundError(`Product #${productId} not found`, 'Product', productId);
    }

    const inStock = product.stockQuantity > 0;
    return {
        success: true,
        message: inStock
            ? `${product.name}: ${product.stockQuantity} units in stock`
            : `${product.name}: Out of stock`,
        productId: product.id,
        productName: product.name,
        stockQuantity: product.stockQuantity,
        inStock,
    };
});

export const execEstimateShipping = defineTool(estimateShippingArgsSchema, async (args, { db }) => {
    const { destinationZip, weightLbs, serviceLevel } = args;
    const rates = await findShippingRates(db, destinationZip, serviceLevel);
    if (rates.length === 0) {
        const service = serviceLevel ? ` ${serviceLevel}` : '';
        throw new BusinessLogicError(`No${service} shipping rates available for ${destinationZip}`, 'shipping_rates');
    }

    const options = estimateShipping(rates, weightLbs);
    const cheapest = options[0];
    return {
        success: true,
        message: `Shipping to ${destinationZip}: ${options.length} option(s), cheapest ${formatCurrency(cheapest.estimatedCost)} `
            + `via ${cheapest.carrier} ${cheapest.serviceType}`,
        destinationZip,
        weightLbs,
        options,
    };
});

export const execSearchKnowledgeBase = defineTool(searchKnowledgeBaseArgsSchema, async ({ query }, { knowledgeBase }) => {
    const articles = await knowledgeBase.searchByText(query);

    return {
        success: true,
        message: `Found ${articles.length} relevant article(s)`,
        articles,
    };
});
