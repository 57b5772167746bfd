/**
 * Ticketing Configuration
 * Centralized business limits and idempotency settings
 */

export const ticketConfig = {
  // === ISSUANCE LIMITS ===
  issuance: {
    maxQuantity: 10,
    minPriceKrw: 1,
    maxPriceKrw: 1_000_000,
    maxTheaterNameLength: 100,
    maxUserIdLength: 100,
    maxMovieTitleLength: 200,
  },

  // === REFUND LIMITS ===
  refund: {
    maxReasonLength: 500,
  },

  // === LISTING ===
  listing: {
    defaultLimit: 100,
    maxLimit: 1000,
  },

  // === IDEMPOTENCY ===
  idempotency: {
    ttlMinutes: parseInt(process.env.IDEMPOTENCY_TTL_MINUTES || '60', 10),
    maxKeyLength: 255,
  },
};
