/**
 * Schema migrations
 *
 * Migrations live in code rather than in a folder so the same definitions
 * run through Kysely's Migrator on PostgreSQL and on in-memory SQLite.
 * Only the column types differ between the two.
 */

import { Migrator, sql, type Kysely, type Migration, type MigrationProvider } from 'kysely';
import type { KyselyDB, SqlDialectName } from './index.js';
import { DatabaseError } from '../utils/errors.js';
import { dbLogger } from '../utils/logger.js';

function columnTypes(dialect: SqlDialectName) {
    const postgres = dialect === 'postgres';
    return {
        id: postgres ? 'serial' : 'integer',
        money: postgres ? sql`numeric(10, 2)` : sql`real`,
        timestamp: postgres ? 'timestamptz' : 'text',
    } as const;
}

function initialSchema(dialect: SqlDialectName): Migration {
    const t = columnTypes(dialect);

    return {
        async up(db: Kysely<unknown>): Promise<void> {
            await db.schema
                .createTable('Product')
                .ifNotExists()
                .addColumn('id', t.id, col => col.primaryKey())
                .addColumn('name', 'text', col => col.notNull())
                .addColumn('specifications', 'text')
                .addColumn('description', 'text')
                .addColumn('price', t.money, col => col.notNull())
                .addColumn('category', 'text')
                .addColumn('stockQuantity', 'integer', col => col.notNull().defaultTo(0))
                .addColumn('createdAt', t.timestamp, col => col.notNull())
                .execute();

            await db.schema
                .createTable('Order')
                .ifNotExists()
                .addColumn('id', t.id, col => col.primaryKey())
                .addColumn('customerName', 'text', col => col.notNull())
                .addColumn('customerEmail', 'text')
                .addColumn('customerPhone', 'text')
                .addColumn('shippingAddress', 'text', col => col.notNull())
                .addColumn('totalAmount', t.money, col => col.notNull().defaultTo(0))
                .addColumn('status', 'text', col => col.notNull().defaultTo('pending'))
                .addColumn('createdAt', t.timestamp, col => col.notNull())
                .addColumn('updatedAt', t.timestamp, col => col.notNull())
                .execute();

            await db.schema
                .createTable('OrderItem')
                .ifNotExists()
                .addColumn('id', t.id, col => col.primaryKey())
                .addColumn('orderId', 'integer', col => col.notNull().references('Order.id'))
                .addColumn('productId', 'integer', col => col.notNull().references('Product.id'))
                .addColumn('quantity', 'integer', col => col.notNull())
                .addColumn('priceAtPurchase', t.money, col => col.notNull())
                .execute();

            await db.schema
                .createTable('SupportTicket')
                .ifNotExists()
                .addColumn('id', t.id, col => col.primaryKey())
                .addColumn('customerName', 'text', col => col.notNull())
                .addColumn('customerEmail', 'text')
                .addColumn('productId', 'integer', col => col.references('Product.id'))
                .addColumn('issueDescription', 'text', col => col.notNull())
                .addColumn('priority', 'text', col => col.notNull().defaultTo('medium'))
                .addColumn('status', 'text', col => col.notNull().defaultTo('open'))
                .addColumn('assignedTo', 'text')
                .addColumn('createdAt', t.timestamp, col => col.notNull())
                .addColumn('updatedAt', t.timestamp, col => col.notNull())
                .addColumn('resolvedAt', t.timestamp)
                .execute();

            await db.schema
                .createTable('ReturnOrder')
                .ifNotExists()
                .addColumn('id', t.id, col => col.primaryKey())
                .addColumn('orderId', 'integer', col => col.notNull().references('Order.id'))
                .addColumn('reason', 'text', col => col.notNull())
                .addColumn('status', 'text', col => col.notNull().defaultTo('pending'))
                .addColumn('refundTotalAmount', t.money, col => col.notNull().defaultTo(0))
                .addColumn('createdAt', t.timestamp, col => col.notNull())
                .addColumn('updatedAt', t.timestamp, col => col.notNull())
                .addColumn('processedAt', t.timestamp)
                .execute();

            await db.schema
                .createTable('ReturnItem')
                .ifNotExists()
                .addColumn('id', t.id, col => col.primaryKey())
                .addColumn('returnId', 'integer', col => col.notNull().references('ReturnOrder.id'))
                .addColumn('productId', 'integer', col => col.notNull().references('Product.id'))
                .addColumn('quantity', 'integer', col => col.notNull())
                .addColumn('priceAtPurchase', t.money, col => col.notNull())
                .addColumn('refundAmount', t.money, col => col.notNull())
                .execute();

            await db.schema
                .createTable('ShippingRate')
                .ifNotExists()
                .addColumn('id', t.id, col => col.primaryKey())
                .addColumn('carrier', 'text', col => col.notNull())
                .addColumn('serviceType', 'text', col => col.notNull())
                .addColumn('zipCode', 'text', col => col.notNull())
                .addColumn('baseRate', t.money, col => col.notNull())
                .addColumn('perLbRate', t.money, col => col.notNull().defaultTo(0))
                .addColumn('estimatedDays', 'integer')
                .execute();

            await db.schema.createIndex('Order_status_idx').ifNotExists().on('Order').column('status').execute();
            await db.schema.createIndex('OrderItem_orderId_idx').ifNotExists().on('OrderItem').column('orderId').execute();
            await db.schema.createIndex('Product_category_idx').ifNotExists().on('Product').column('category').execute();
            await db.schema.createIndex('SupportTicket_status_idx').ifNotExists().on('SupportTicket').column('status').execute();
            await db.schema.createIndex('ReturnOrder_orderId_idx').ifNotExists().on('ReturnOrder').column('orderId').execute();
            await db.schema.createIndex('ReturnItem_returnId_idx').ifNotExists().on('ReturnItem').column('returnId').execute();
            await db.schema
                .createIndex('ShippingRate_zip_service_idx')
                .ifNotExists()
                .on('ShippingRate')
                .columns(['zipCode', 'serviceType'])
                .execute();
        },

        async down(db: Kysely<unknown>): Promise<void> {
            for (const table of ['ReturnItem', 'ReturnOrder', 'SupportTicket', 'OrderItem', 'Order', 'ShippingRate', 'Product']) {
                await db.schema.dropTable(table).ifExists().execute();
            }
        },
    };
}

class InlineMigrationProvider implements MigrationProvider {
    constructor(private readonly dialect: SqlDialectName) {}

    async getMigrations(): Promise<Record<string, Migration>> {
        return {
            '0001_initial_schema': initialSchema(this.dialect),
        };
    }
}

/**
 * Bring the schema up to date.
 * @throws DatabaseError when a migration fails
 */
export async function migrateToLatest(db: KyselyDB, dialect: SqlDialectName): Promise<void> {
    const migrator = new Migrator({ db, provider: new InlineMigrationProvider(dialect) });
    const { error, results } = await migrator.migrateToLatest();

    for (const result of results ?? []) {
        if (result.status === 'Success') {
            dbLogger.info({ migration: result.migrationName }, 'Migration applied');
        } else if (result.status === 'Error') {
            dbLogger.error({ migration: result.migrationName }, 'Migration failed');
        }
    }

    if (error) {
        throw new DatabaseError('Schema migration failed', error instanceof Error ? error : null);
    }
}
