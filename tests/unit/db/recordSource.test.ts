import { jest, describe, it, expect, beforeEach } from '@jest/globals';

// ── Mock logger before importing the module under test ──────────────

jest.unstable_mockModule('../../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const { createRecordSource } = await import('../../../src/db/recordSource.js');

// ── Mock Knex builder ───────────────────────────────────────────────

interface MockQueryBuilder {
  leftJoin: jest.Mock<() => MockQueryBuilder>;
  where: jest.Mock<(arg: unknown) => MockQueryBuilder>;
  orWhereNull: jest.Mock<() => MockQueryBuilder>;
  orderBy: jest.Mock<() => MockQueryBuilder>;
  select: jest.Mock<() => Promise<unknown[]>>;
}

function createMockReadonlyDb() {
  const builder: MockQueryBuilder = {
    leftJoin: jest.fn().mockReturnThis() as MockQueryBuilder['leftJoin'],
    where: jest.fn().mockReturnThis() as MockQueryBuilder['where'],
    orWhereNull: jest.fn().mockReturnThis() as MockQueryBuilder['orWhereNull'],
    orderBy: jest.fn().mockReturnThis() as MockQueryBuilder['orderBy'],
    select: jest.fn() as MockQueryBuilder['select'],
  };

  const readonlyDb = jest.fn().mockReturnValue(builder);

  return { readonlyDb, builder };
}

type SourceDeps = Parameters<typeof createRecordSource>[0];

// ── Tests ───────────────────────────────────────────────────────────

describe('recordSource', () => {
  let readonlyDb: ReturnType<typeof createMockReadonlyDb>['readonlyDb'];
  let builder: MockQueryBuilder;

  beforeEach(() => {
    jest.clearAllMocks();
    const mocks = createMockReadonlyDb();
    readonlyDb = mocks.readonlyDb;
    builder = mocks.builder;
  });

  function makeSource() {
    return createRecordSource({
      readonlyDb: readonlyDb as unknown as SourceDeps['readonlyDb'],
    });
  }

  describe('fetchCompletedOrderLineItems()', () => {
    it('reads order_items joined to orders', async () => {
      builder.select.mockResolvedValueOnce([]);

      await makeSource().fetchCompletedOrderLineItems();

      expect(readonlyDb).toHaveBeenCalledWith('order_items as oi');
      expect(builder.leftJoin).toHaveBeenCalledWith('orders as o', 'o.id', 'oi.order_id');
      expect(builder.orderBy).toHaveBeenCalledWith('oi.id', 'asc');
    });

    it('keeps completed orders and line items whose order is missing', async () => {
      builder.select.mockResolvedValueOnce([]);

      await makeSource().fetchCompletedOrderLineItems();

      const [filter] = builder.where.mock.calls[0];
      expect(typeof filter).toBe('function');

      const qb = {
        where: jest.fn().mockReturnThis(),
        orWhereNull: jest.fn().mockReturnThis(),
      };
      (filter as (q: typeof qb) => void)(qb);

      expect(qb.where).toHaveBeenCalledWith('o.status', 'completed');
      expect(qb.orWhereNull).toHaveBeenCalledWith('o.id');
    });

    it('converts database rows into line item rows', async () => {
      builder.select.mockResolvedValueOnce([
        {
          line_item_id: 'li-1',
          customer_id: 'cust-a',
          order_id: 'ord-1',
          order_status: 'completed',
          order_created_at: new Date('2025-03-01T10:00:00Z'),
          quantity: 2,
          price_at_purchase: '19.99',
        },
        {
          line_item_id: 'li-2',
          customer_id: 'cust-b',
          order_id: 'ord-2',
          order_status: 'completed',
          order_created_at: '2025-04-01T00:00:00.000Z',
          quantity: '3',
          price_at_purchase: 5,
        },
      ]);

      const rows = await makeSource().fetchCompletedOrderLineItems();

      expect(rows).toEqual([
        {
          lineItemId: 'li-1',
          customerId: 'cust-a',
          orderId: 'ord-1',
          orderStatus: 'completed',
          orderCreatedAt: new Date('2025-03-01T10:00:00Z'),
          quantity: 2,
          priceAtPurchase: 19.99,
        },
        {
          lineItemId: 'li-2',
          customerId: 'cust-b',
          orderId: 'ord-2',
          orderStatus: 'completed',
          orderCreatedAt: new Date('2025-04-01T00:00:00Z'),
          quantity: 3,
          priceAtPurchase: 5,
        },
      ]);
    });

    it('passes orphaned line items through with null order fields', async () => {
      builder.select.mockResolvedValueOnce([
        {
          line_item_id: 'li-9',
          customer_id: null,
          order_id: null,
          order_status: null,
          order_created_at: null,
          quantity: 1,
          price_at_purchase: '10.00',
        },
      ]);

      const [row] = await makeSource().fetchCompletedOrderLineItems();

      expect(row.orderId).toBeNull();
      expect(row.customerId).toBeNull();
      expect(row.orderCreatedAt).toBeNull();
    });

    it('propagates query failures', async () => {
      builder.select.mockRejectedValueOnce(new Error('connection refused'));

      await expect(makeSource().fetchCompletedOrderLineItems()).rejects.toThrow(
        'connection refused',
      );
    });
  });

  describe('readSnapshot()', () => {
    function createMockTransaction() {
      const trxBuilder: MockQueryBuilder = {
        leftJoin: jest.fn().mockReturnThis() as MockQueryBuilder['leftJoin'],
        where: jest.fn().mockReturnThis() as MockQueryBuilder['where'],
        orWhereNull: jest.fn().mockReturnThis() as MockQueryBuilder['orWhereNull'],
        orderBy: jest.fn().mockReturnThis() as MockQueryBuilder['orderBy'],
        select: jest.fn() as MockQueryBuilder['select'],
      };
      const trx = jest.fn().mockReturnValue(trxBuilder);
      return { trx, trxBuilder };
    }

    it('runs both reads inside one read-only repeatable-read transaction', async () => {
      const { trx, trxBuilder } = createMockTransaction();
      trxBuilder.select
        .mockResolvedValueOnce([
          {
            line_item_id: 'li-1',
            customer_id: 'cust-a',
            order_id: 'ord-1',
            order_status: 'completed',
            order_created_at: new Date('2025-03-01T10:00:00Z'),
            quantity: 1,
            price_at_purchase: '12.50',
          },
        ])
        .mockResolvedValueOnce([{ id: 'cust-a', name: 'Ada Lovelace', email: 'ada@example.com' }]);

      const transaction = jest.fn(
        async (scope: (t: typeof trx) => Promise<unknown>, _config: unknown) => scope(trx),
      );
      const db = Object.assign(readonlyDb, { transaction });

      const snapshot = await createRecordSource({
        readonlyDb: db as unknown as SourceDeps['readonlyDb'],
      }).readSnapshot();

      expect(transaction).toHaveBeenCalledTimes(1);
      expect(transaction.mock.calls[0][1]).toEqual({
        isolationLevel: 'repeatable read',
        readOnly: true,
      });
      expect(trx).toHaveBeenNthCalledWith(1, 'order_items as oi');
      expect(trx).toHaveBeenNthCalledWith(2, 'customers');
      expect(readonlyDb).not.toHaveBeenCalled();
      expect(snapshot.rows.map((r) => r.customerId)).toEqual(['cust-a']);
      expect([...snapshot.customers.keys()]).toEqual(['cust-a']);
    });

    it('propagates a failed read out of the transaction', async () => {
      const { trx, trxBuilder } = createMockTransaction();
      trxBuilder.select.mockRejectedValueOnce(new Error('could not serialize access'));
      const transaction = jest.fn(
        async (scope: (t: typeof trx) => Promise<unknown>, _config: unknown) => scope(trx),
      );
      const db = Object.assign(readonlyDb, { transaction });

      await expect(
        createRecordSource({
          readonlyDb: db as unknown as SourceDeps['readonlyDb'],
        }).readSnapshot(),
      ).rejects.toThrow('could not serialize access');
    });
  });

  describe('fetchCustomers()', () => {
    it('returns a map from customer id to name and email', async () => {
      builder.select.mockResolvedValueOnce([
        { id: 'cust-a', name: 'Ada Lovelace', email: 'ada@example.com' },
        { id: 'cust-b', name: null, email: 'anon@example.com' },
      ]);

      const customers = await makeSource().fetchCustomers();

      expect(readonlyDb).toHaveBeenCalledWith('customers');
      expect(builder.select).toHaveBeenCalledWith('id', 'name', 'email');
      expect([...customers.entries()]).toEqual([
        ['cust-a', { name: 'Ada Lovelace', email: 'ada@example.com' }],
        ['cust-b', { name: '', email: 'anon@example.com' }],
      ]);
    });
  });
});
