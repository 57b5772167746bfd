/**
 * Ticket State Machine
 * Enforces valid ticket status transitions
 */

import { TicketStatus } from '../types/ticket.types';
import { InvalidStatusTransitionError } from '../errors/domain-errors';

export class TicketStateMachine {
  /**
   * Key = current status, Value = allowed next statuses
   */
  private static readonly transitions: Record<TicketStatus, TicketStatus[]> = {
    [TicketStatus.ISSUED]: [TicketStatus.CANCELED],
    [TicketStatus.CANCELED]: [],
  };

  static canTransition(from: TicketStatus, to: TicketStatus): boolean {
    return this.transitions[from].includes(to);
  }

  /**
   * Validate state transition (throws error if invalid)
   */
  static validateTransition(from: TicketStatus, to: TicketStatus): void {
    if (!this.canTransition(from, to)) {
      throw new InvalidStatusTransitionError(from, to);
    }
  }

  static isTerminalState(status: TicketStatus): boolean {
    return this.transitions[status].length === 0;
  }
}
