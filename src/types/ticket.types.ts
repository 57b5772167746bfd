export enum TicketStatus {
  ISSUED = 'issued',
  CANCELED = 'canceled',
}

export interface Ticket {
  id: string;
  theaterName: string;
  userId: string;
  movieTitle: string;
  priceKrw: number;
  status: TicketStatus;
  memo: string | null;
  cancelReason: string | null;
  issuedAt: Date;
  canceledAt: Date | null;
  updatedAt: Date;
}

/**
 * Fields shared by every ticket of one issuance batch
 */
export interface NewTicket {
  theaterName: string;
  userId: string;
  movieTitle: string;
  priceKrw: number;
  memo: string | null;
}

export interface IssueTicketRequest {
  theaterName: string;
  userId: string;
  movieTitle: string;
  priceKrw: number;
  quantity?: number;
  memo?: string | null;
}

export interface IssueTicketSummary {
  theaterName: string;
  movieTitle: string;
  priceKrw: number;
}

export interface IssueTicketResponse {
  ticketIds: string[];
  count: number;
  summary: IssueTicketSummary;
}

export interface IssueTicketResult {
  response: IssueTicketResponse;
  replayed: boolean;
}

export interface RefundTicketRequest {
  ticketIds: string[];
  reason?: string | null;
}

export interface RefundTicketResponse {
  refunded: string[];
  alreadyCanceled: string[];
  notFound: string[];
}

export interface TicketFilters {
  theaterName?: string;
  userId?: string;
  movieTitle?: string;
  status?: TicketStatus;
}

export interface Pagination {
  limit: number;
  offset: number;
}

export interface ListTicketsQuery extends TicketFilters, Partial<Pagination> {}

export interface TicketPage {
  tickets: Ticket[];
  total: number;
}

export interface TicketListResponse extends TicketPage, Pagination {}
