import { Pool, PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import {
  NewTicket,
  Pagination,
  Ticket,
  TicketFilters,
  TicketPage,
  TicketStatus,
} from '../types/ticket.types';
import { withTransaction } from '../utils/transaction';
import { createContextLogger } from '../utils/logger';

const log = createContextLogger({ component: 'TicketModel' });

/**
 * Operations available inside one database transaction.
 * Nothing is visible to other connections until the transaction commits.
 */
export interface TicketUnitOfWork {
  /** Insert `quantity` tickets sharing the same fields, in one statement */
  insertMany(ticket: NewTicket, quantity: number): Promise<Ticket[]>;
  /** Batch lookup in one round trip; found rows stay locked until commit */
  findByIds(ids: string[]): Promise<Ticket[]>;
  /** Move issued tickets to canceled; rows not in `issued` are left untouched */
  cancelMany(ids: string[], canceledAt: Date, reason: string | null): Promise<Ticket[]>;
}

export interface TicketStore {
  transaction<T>(fn: (uow: TicketUnitOfWork) => Promise<T>): Promise<T>;
  findById(id: string): Promise<Ticket | null>;
  list(filters: TicketFilters, pagination: Pagination): Promise<TicketPage>;
  ping(): Promise<void>;
}

export type TicketPool = Pick<Pool, 'query' | 'connect'>;

export interface TicketRow {
  id: string;
  theater_name: string;
  user_id: string;
  movie_title: string;
  price_krw: number;
  status: string;
  memo: string | null;
  cancel_reason: string | null;
  issued_at: Date;
  canceled_at: Date | null;
  updated_at: Date;
}

const FILTER_COLUMNS: [keyof TicketFilters, string][] = [
  ['theaterName', 'theater_name'],
  ['userId', 'user_id'],
  ['movieTitle', 'movie_title'],
  ['status', 'status'],
];

export function parseTicketStatus(value: string): TicketStatus {
  switch (value) {
    case TicketStatus.ISSUED:
      return TicketStatus.ISSUED;
    case TicketStatus.CANCELED:
      return TicketStatus.CANCELED;
    default:
      throw new Error(`Unknown ticket status in database: ${value}`);
  }
}

export function mapToTicket(row: TicketRow): Ticket {
  return {
    id: row.id,
    theaterName: row.theater_name,
    userId: row.user_id,
    movieTitle: row.movie_title,
    priceKrw: Number(row.price_krw),
    status: parseTicketStatus(row.status),
    memo: row.memo,
    cancelReason: row.cancel_reason,
    issuedAt: row.issued_at,
    canceledAt: row.canceled_at,
    updatedAt: row.updated_at,
  };
}

export class TicketTransaction implements TicketUnitOfWork {
  constructor(private client: Pick<PoolClient, 'query'>) {}

  async insertMany(ticket: NewTicket, quantity: number): Promise<Ticket[]> {
    const ids = Array.from({ length: quantity }, () => uuidv4());
    const issuedAt = new Date();

    const query = `
      INSERT INTO tickets (
        id, theater_name, user_id, movie_title, price_krw,
        status, memo, issued_at, updated_at
      )
      SELECT new_id, $2, $3, $4, $5, $6, $7, $8, $8
      FROM unnest($1::text[]) AS new_id
      RETURNING *
    `;

    const values = [
      ids,
      ticket.theaterName,
      ticket.userId,
      ticket.movieTitle,
      ticket.priceKrw,
      TicketStatus.ISSUED,
      ticket.memo,
      issuedAt,
    ];

    const result = await this.client.query<TicketRow>(query, values);
    const byId = new Map(result.rows.map((row) => [row.id, mapToTicket(row)]));

    // RETURNING order is not guaranteed; keep the generated order
    return ids.flatMap((id) => {
      const created = byId.get(id);
      return created ? [created] : [];
    });
  }

  async findByIds(ids: string[]): Promise<Ticket[]> {
    const uniqueIds = [...new Set(ids)];
    if (uniqueIds.length === 0) {
      return [];
    }

    const query = 'SELECT * FROM tickets WHERE id = ANY($1::text[]) FOR UPDATE';
    const result = await this.client.query<TicketRow>(query, [uniqueIds]);
    return result.rows.map(mapToTicket);
  }

  async cancelMany(ids: string[], canceledAt: Date, reason: string | null): Promise<Ticket[]> {
    const uniqueIds = [...new Set(ids)];
    if (uniqueIds.length === 0) {
      return [];
    }

    const query = `
      UPDATE tickets
      SET status = $2, canceled_at = $3, cancel_reason = $4, updated_at = $3
      WHERE id = ANY($1::text[]) AND status = $5
      RETURNING *
    `;

    const result = await this.client.query<TicketRow>(query, [
      uniqueIds,
      TicketStatus.CANCELED,
      canceledAt,
      reason,
      TicketStatus.ISSUED,
    ]);
    return result.rows.map(mapToTicket);
  }
}

export class TicketModel implements TicketStore {
  constructor(private pool: TicketPool) {}

  async transaction<T>(fn: (uow: TicketUnitOfWork) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, (client) => fn(new TicketTransaction(client)));
  }

  async findById(id: string): Promise<Ticket | null> {
    const query = 'SELECT * FROM tickets WHERE id = $1';
    const result = await this.pool.query<TicketRow>(query, [id]);
    return result.rows[0] ? mapToTicket(result.rows[0]) : null;
  }

  async list(filters: TicketFilters, pagination: Pagination): Promise<TicketPage> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    for (const [key, column] of FILTER_COLUMNS) {
      const value = filters[key];
      if (value !== undefined && value !== '') {
        values.push(value);
        conditions.push(`${column} = $${values.length}`);
      }
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    try {
      const countResult = await this.pool.query<{ total: number }>(
        `SELECT COUNT(*)::int AS total FROM tickets ${where}`,
        values
      );

      const pageValues = [...values, pagination.limit, pagination.offset];
      const pageResult = await this.pool.query<TicketRow>(
        `
          SELECT * FROM tickets
          ${where}
          ORDER BY issued_at DESC, id DESC
          LIMIT $${values.length + 1} OFFSET $${values.length + 2}
        `,
        pageValues
      );

      return {
        tickets: pageResult.rows.map(mapToTicket),
        total: countResult.rows[0]?.total ?? 0,
      };
    } catch (error) {
      log.error({ err: error, filters, pagination }, 'Error listing tickets');
      throw error;
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
