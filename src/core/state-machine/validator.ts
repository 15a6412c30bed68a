import { OrderEvent, OrderStatus, TriggerType } from '../domain/enums';
import { getInitialState, getTerminalStates, TRANSITION_RULES } from './transition-rules';
import { SideEffect, TransitionRule } from './types';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * State machine validator - checks a rule table for consistency
 */
export class StateMachineValidator {
  private readonly rules: TransitionRule[];
  private readonly errors: string[] = [];
  private readonly warnings: string[] = [];

  constructor(rules: TransitionRule[] = TRANSITION_RULES) {
    this.rules = rules;
  }

  validate(): ValidationResult {
    this.errors.length = 0;
    this.warnings.length = 0;

    this.validateKnownValues();
    this.validateNoDuplicateEvents();
    this.validateTerminalStates();
    this.validateReachability();
    this.validateSideEffects();

    return {
      valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
    };
  }

  private validateKnownValues(): void {
    const states: string[] = Object.values(OrderStatus);
    const triggers: string[] = Object.values(TriggerType);
    const events: string[] = Object.values(OrderEvent);

    for (const rule of this.rules) {
      if (!events.includes(rule.event)) {
        this.errors.push(`Unknown event: ${rule.event}`);
      }
      for (const from of rule.from) {
        if (!states.includes(from)) {
          this.errors.push(`Invalid 'from' state in ${rule.event}: ${from}`);
        }
      }
      if (!states.includes(rule.to)) {
        this.errors.push(`Invalid 'to' state in ${rule.event}: ${rule.to}`);
      }
      if (rule.triggers.length === 0) {
        this.errors.push(`Event ${rule.event} has no allowed triggers`);
      }
      for (const trigger of rule.triggers) {
        if (!triggers.includes(trigger)) {
          this.errors.push(`Invalid trigger '${trigger}' in ${rule.event}`);
        }
      }
    }
  }

  /**
   * Each event maps to exactly one destination
   */
  private validateNoDuplicateEvents(): void {
    const seen = new Set<OrderEvent>();
    for (const rule of this.rules) {
      if (seen.has(rule.event)) {
        this.errors.push(`Duplicate rule for event: ${rule.event}`);
      }
      seen.add(rule.event);
    }

    for (const event of Object.values(OrderEvent)) {
      if (!seen.has(event)) {
        this.warnings.push(`Event ${event} has no rule`);
      }
    }
  }

  private validateTerminalStates(): void {
    const terminal = getTerminalStates();
    for (const rule of this.rules) {
      for (const from of rule.from) {
        if (terminal.includes(from)) {
          this.errors.push(`Terminal state '${from}' has outgoing event ${rule.event}`);
        }
      }
      if (rule.from.includes(rule.to)) {
        this.errors.push(`Event ${rule.event} loops on '${rule.to}'`);
      }
    }
  }

  private validateReachability(): void {
    const initial = getInitialState();
    const reached = new Set<OrderStatus>([initial]);
    const queue: OrderStatus[] = [initial];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const rule of this.rules) {
        if (rule.from.includes(current) && !reached.has(rule.to)) {
          reached.add(rule.to);
          queue.push(rule.to);
        }
      }
    }

    for (const state of Object.values(OrderStatus)) {
      if (!reached.has(state)) {
        this.errors.push(`State '${state}' is unreachable from '${initial}'`);
      }
    }

    for (const rule of this.rules) {
      if (rule.to === initial) {
        this.warnings.push(`Initial state has incoming event ${rule.event}`);
      }
    }
  }

  /**
   * Fulfillment starts only on entering paid; refunds start only on entering failed
   */
  private validateSideEffects(): void {
    for (const rule of this.rules) {
      if (
        rule.sideEffects.includes(SideEffect.ENQUEUE_FULFILLMENT) &&
        rule.to !== OrderStatus.PAID
      ) {
        this.errors.push(`Event ${rule.event} enqueues fulfillment without entering paid`);
      }
      if (
        rule.sideEffects.includes(SideEffect.INITIATE_REFUND) &&
        rule.to !== OrderStatus.FAILED
      ) {
        this.errors.push(`Event ${rule.event} initiates a refund without entering failed`);
      }
      if (rule.to === OrderStatus.REFUNDED && !rule.from.every((s) => s === OrderStatus.FAILED)) {
        this.errors.push(`Event ${rule.event} reaches refunded from a state other than failed`);
      }
      if (new Set(rule.sideEffects).size !== rule.sideEffects.length) {
        this.warnings.push(`Event ${rule.event} lists a side effect twice`);
      }
    }
  }
}

export const defaultValidator = new StateMachineValidator();
