import {
  TicketModel,
  TicketTransaction,
  mapToTicket,
  parseTicketStatus,
} from '../../src/models/ticket.model';
import { TicketStatus } from '../../src/types/ticket.types';
import { FIXED_NOW, ticketRow } from '../fixtures/test-data';

describe('TicketModel', () => {
  let mockClient: { query: jest.Mock; release: jest.Mock };
  let mockPool: { query: jest.Mock; connect: jest.Mock };
  let model: TicketModel;

  beforeEach(() => {
    mockClient = {
      query: jest.fn().mockResolvedValue({ rows: [] }),
      release: jest.fn(),
    };
    mockPool = {
      query: jest.fn(),
      connect: jest.fn().mockResolvedValue(mockClient),
    };
    model = new TicketModel(mockPool);
  });

  describe('mapToTicket', () => {
    it('maps snake_case columns to a Ticket', () => {
      expect(mapToTicket(ticketRow({ memo: 'aisle seat' }))).toEqual({
        id: 'ticket-1',
        theaterName: 'Downtown Cinema',
        userId: 'user-1',
        movieTitle: 'The Long Night',
        priceKrw: 12000,
        status: TicketStatus.ISSUED,
        memo: 'aisle seat',
        cancelReason: null,
        issuedAt: FIXED_NOW,
        canceledAt: null,
        updatedAt: FIXED_NOW,
      });
    });

    it('rejects an unknown status value', () => {
      expect(() => parseTicketStatus('refunded')).toThrow('Unknown ticket status in database: refunded');
    });
  });

  describe('findById', () => {
    it('returns the mapped ticket', async () => {
      mockPool.query.mockResolvedValue({ rows: [ticketRow()] });

      const ticket = await model.findById('ticket-1');

      expect(mockPool.query).toHaveBeenCalledWith('SELECT * FROM tickets WHERE id = $1', ['ticket-1']);
      expect(ticket?.id).toBe('ticket-1');
    });

    it('returns null when the row does not exist', async () => {
      mockPool.query.mockResolvedValue({ rows: [] });

      await expect(model.findById('missing')).resolves.toBeNull();
    });
  });

  describe('list', () => {
    it('filters, counts and pages in issued_at DESC, id DESC order', async () => {
      mockPool.query
        .mockResolvedValueOnce({ rows: [{ total: 25 }] })
        .mockResolvedValueOnce({ rows: [ticketRow({ id: 'b' }), ticketRow({ id: 'a' })] });

      const page = await model.list(
        { theaterName: 'Downtown Cinema', status: TicketStatus.ISSUED },
        { limit: 10, offset: 20 }
      );

      expect(mockPool.query).toHaveBeenNthCalledWith(
        1,
        'SELECT COUNT(*)::int AS total FROM tickets WHERE theater_name = $1 AND status = $2',
        ['Downtown Cinema', 'issued']
      );
      expect(mockPool.query).toHaveBeenNthCalledWith(
        2,
        expect.stringContaining('ORDER BY issued_at DESC, id DESC'),
        ['Downtown Cinema', 'issued', 10, 20]
      );
      expect(mockPool.query.mock.calls[1][0]).toContain('LIMIT $3 OFFSET $4');
      expect(page.total).toBe(25);
      expect(page.tickets.map((ticket) => ticket.id)).toEqual(['b', 'a']);
    });

    it('omits the WHERE clause without filters', async () => {
      mockPool.query
        .mockResolvedValueOnce({ rows: [{ total: 0 }] })
        .mockResolvedValueOnce({ rows: [] });

      const page = await model.list({}, { limit: 100, offset: 0 });

      expect(mockPool.query.mock.calls[0][0]).not.toContain('WHERE');
      expect(mockPool.query.mock.calls[1][1]).toEqual([100, 0]);
      expect(page).toEqual({ tickets: [], total: 0 });
    });

    it('rethrows query errors', async () => {
      mockPool.query.mockRejectedValue(new Error('connection reset'));

      await expect(model.list({}, { limit: 10, offset: 0 })).rejects.toThrow('connection reset');
    });
  });

  describe('transaction', () => {
    it('inserts a batch inside BEGIN/COMMIT and keeps the generated order', async () => {
      mockClient.query.mockImplementation(async (sql: string, values?: unknown[]) => {
        const ids = values?.[0];
        if (sql.includes('INSERT INTO tickets') && Array.isArray(ids)) {
          // Return rows in reverse to check reordering
          return { rows: [...ids].reverse().map((id) => ticketRow({ id: String(id) })) };
        }
        return { rows: [] };
      });

      const tickets = await model.transaction((uow) =>
        uow.insertMany(
          {
            theaterName: 'Downtown Cinema',
            userId: 'user-1',
            movieTitle: 'The Long Night',
            priceKrw: 12000,
            memo: null,
          },
          3
        )
      );

      const insertCall = mockClient.query.mock.calls[1];
      const generatedIds: unknown = insertCall[1][0];

      expect(mockClient.query.mock.calls[0][0]).toBe('BEGIN');
      expect(mockClient.query.mock.calls[2][0]).toBe('COMMIT');
      expect(insertCall[1].slice(1)).toEqual([
        'Downtown Cinema',
        'user-1',
        'The Long Night',
        12000,
        'issued',
        null,
        expect.any(Date),
      ]);
      expect(tickets.map((ticket) => ticket.id)).toEqual(generatedIds);
      expect(new Set(tickets.map((ticket) => ticket.id)).size).toBe(3);
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('rolls back and releases the client when the callback fails', async () => {
      mockClient.query.mockImplementation(async (sql: string) => {
        if (sql.includes('INSERT INTO tickets')) {
          throw new Error('unique violation');
        }
        return { rows: [] };
      });

      await expect(
        model.transaction((uow) =>
          uow.insertMany(
            { theaterName: 'T', userId: 'U', movieTitle: 'M', priceKrw: 1, memo: null },
            1
          )
        )
      ).rejects.toThrow('unique violation');

      const statements = mockClient.query.mock.calls.map((call) => call[0]);
      expect(statements[0]).toBe('BEGIN');
      expect(statements[statements.length - 1]).toBe('ROLLBACK');
      expect(statements).not.toContain('COMMIT');
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });
  });

  it('ping() runs SELECT 1', async () => {
    mockPool.query.mockResolvedValue({ rows: [{ '?column?': 1 }] });

    await model.ping();

    expect(mockPool.query).toHaveBeenCalledWith('SELECT 1');
  });
});

describe('TicketTransaction', () => {
  let mockClient: { query: jest.Mock };
  let uow: TicketTransaction;

  beforeEach(() => {
    mockClient = { query: jest.fn().mockResolvedValue({ rows: [] }) };
    uow = new TicketTransaction(mockClient);
  });

  it('locks the requested rows with one deduplicated lookup', async () => {
    mockClient.query.mockResolvedValue({ rows: [ticketRow({ id: 'a' })] });

    const found = await uow.findByIds(['a', 'b', 'a']);

    expect(mockClient.query).toHaveBeenCalledTimes(1);
    expect(mockClient.query).toHaveBeenCalledWith(
      'SELECT * FROM tickets WHERE id = ANY($1::text[]) FOR UPDATE',
      [['a', 'b']]
    );
    expect(found.map((ticket) => ticket.id)).toEqual(['a']);
  });

  it('skips the query for an empty lookup', async () => {
    await expect(uow.findByIds([])).resolves.toEqual([]);
    expect(mockClient.query).not.toHaveBeenCalled();
  });

  it('cancels only issued rows and stamps time and reason', async () => {
    const canceledAt = new Date('2026-03-02T09:00:00.000Z');
    mockClient.query.mockResolvedValue({
      rows: [
        ticketRow({
          id: 'a',
          status: TicketStatus.CANCELED,
          canceled_at: canceledAt,
          cancel_reason: 'schedule change',
          updated_at: canceledAt,
        }),
      ],
    });

    const canceled = await uow.cancelMany(['a', 'a'], canceledAt, 'schedule change');

    const [sql, params] = mockClient.query.mock.calls[0];
    expect(sql).toContain('WHERE id = ANY($1::text[]) AND status = $5');
    expect(params).toEqual([['a'], 'canceled', canceledAt, 'schedule change', 'issued']);
    expect(canceled[0]).toMatchObject({
      id: 'a',
      status: TicketStatus.CANCELED,
      canceledAt,
      cancelReason: 'schedule change',
    });
  });
});
