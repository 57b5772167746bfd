import Joi from 'joi';
import { ticketConfig } from '../config/ticket.config';
import {
  IssueTicketRequest,
  ListTicketsQuery,
  RefundTicketRequest,
  TicketStatus,
} from '../types/ticket.types';

const { issuance, refund, listing, idempotency } = ticketConfig;

// ============================================================================
// TICKET VALIDATION SCHEMAS
// ============================================================================

/**
 * Issue Ticket Request Schema
 */
export const issueTicketSchema = Joi.object<IssueTicketRequest>({
  theaterName: Joi.string()
    .min(1)
    .max(issuance.maxTheaterNameLength)
    .required()
    .messages({
      'string.empty': 'Theater name is required',
      'string.max': `Theater name cannot exceed ${issuance.maxTheaterNameLength} characters`,
      'any.required': 'Theater name is required',
    }),

  userId: Joi.string()
    .min(1)
    .max(issuance.maxUserIdLength)
    .required()
    .messages({
      'string.empty': 'User ID is required',
      'string.max': `User ID cannot exceed ${issuance.maxUserIdLength} characters`,
      'any.required': 'User ID is required',
    }),

  movieTitle: Joi.string()
    .min(1)
    .max(issuance.maxMovieTitleLength)
    .required()
    .messages({
      'string.empty': 'Movie title is required',
      'string.max': `Movie title cannot exceed ${issuance.maxMovieTitleLength} characters`,
      'any.required': 'Movie title is required',
    }),

  priceKrw: Joi.number()
    .integer()
    .min(issuance.minPriceKrw)
    .max(issuance.maxPriceKrw)
    .required()
    .messages({
      'number.min': 'Price must be greater than 0',
      'number.max': `Price cannot exceed ${issuance.maxPriceKrw}`,
      'number.integer': 'Price must be an integer',
      'any.required': 'Price is required',
    }),

  quantity: Joi.number()
    .integer()
    .min(1)
    .max(issuance.maxQuantity)
    .default(1)
    .messages({
      'number.min': 'Quantity must be at least 1',
      'number.max': `Maximum ${issuance.maxQuantity} tickets allowed per request`,
    }),

  memo: Joi.string()
    .allow('', null)
    .default(null),
});

/**
 * Refund Ticket Request Schema
 */
export const refundTicketSchema = Joi.object<RefundTicketRequest>({
  ticketIds: Joi.array()
    .items(Joi.string().min(1).max(255))
    .min(1)
    .required()
    .messages({
      'array.min': 'At least one ticket ID is required',
      'any.required': 'Ticket IDs are required',
    }),

  reason: Joi.string()
    .max(refund.maxReasonLength)
    .allow('', null)
    .default(null),
});

/**
 * List Tickets Query Parameters Schema
 */
export const listTicketsQuerySchema = Joi.object<ListTicketsQuery>({
  theaterName: Joi.string().min(1).max(issuance.maxTheaterNameLength).optional(),
  userId: Joi.string().min(1).max(issuance.maxUserIdLength).optional(),
  movieTitle: Joi.string().min(1).max(issuance.maxMovieTitleLength).optional(),

  status: Joi.string()
    .valid(TicketStatus.ISSUED, TicketStatus.CANCELED)
    .optional()
    .messages({
      'any.only': 'Status must be one of: issued, canceled',
    }),

  limit: Joi.number()
    .integer()
    .min(1)
    .max(listing.maxLimit)
    .default(listing.defaultLimit)
    .messages({
      'number.min': 'Limit must be at least 1',
      'number.max': `Limit cannot exceed ${listing.maxLimit}`,
    }),

  offset: Joi.number()
    .integer()
    .min(0)
    .default(0)
    .messages({
      'number.min': 'Offset cannot be negative',
    }),
});

/**
 * Ticket ID Parameter Schema (for path parameters)
 */
export const ticketIdParamSchema = Joi.object<{ ticketId: string }>({
  ticketId: Joi.string().min(1).max(255).required(),
});

/**
 * Idempotency-Key header value
 */
export const idempotencyKeySchema = Joi.string()
  .min(1)
  .max(idempotency.maxKeyLength)
  .messages({
    'string.empty': 'Idempotency-Key must not be empty',
    'string.max': `Idempotency-Key cannot exceed ${idempotency.maxKeyLength} characters`,
  });
