import { OrderEvent, OrderStatus, TriggerType } from '../domain/enums';
import { findRuleForEvent, getInitialState, getTerminalStates, TRANSITION_RULES } from './transition-rules';
import {
  InvalidStateError,
  StateMachineConfig,
  TransitionContext,
  TransitionDecision,
  TransitionGuard,
  TransitionRule,
} from './types';

/**
 * Order state machine - decides whether an event applies to an order snapshot.
 * It never persists anything; the order service turns an allowed decision into
 * a conditional write.
 */
export class OrderStateMachine {
  private readonly config: StateMachineConfig;
  private readonly rules: Map<OrderEvent, TransitionRule>;

  constructor(config?: Partial<StateMachineConfig>) {
    this.config = {
      initialState: getInitialState(),
      rules: TRANSITION_RULES,
      ...config,
    };

    this.rules = new Map();
    for (const rule of this.config.rules) {
      this.rules.set(rule.event, { ...rule, guards: [...(rule.guards ?? [])] });
    }
  }

  /**
   * Evaluate an event against the order's current status, trigger and guards.
   * A mismatching source state is reported as `stale`, not thrown: under
   * at-least-once delivery it is an expected outcome.
   */
  async decide(context: TransitionContext): Promise<TransitionDecision> {
    const fromStatus = context.order.status;
    const rule = this.getRule(context.event);

    if (!rule.from.includes(fromStatus)) {
      return {
        allowed: false,
        rejection: 'stale',
        fromStatus,
        reason: `Event ${context.event} does not apply in status ${fromStatus}`,
      };
    }

    if (!rule.triggers.includes(context.triggerType)) {
      return {
        allowed: false,
        rejection: 'trigger_not_allowed',
        fromStatus,
        reason: `Trigger ${context.triggerType} may not raise ${context.event}`,
      };
    }

    const guardFailures = await this.checkGuards(rule.guards ?? [], context);
    if (guardFailures.length > 0) {
      return {
        allowed: false,
        rejection: 'guard_rejected',
        fromStatus,
        reason: 'Transition blocked by guards',
        guardFailures,
      };
    }

    return {
      allowed: true,
      rule,
      fromStatus,
      toStatus: rule.to,
      sideEffects: [...rule.sideEffects],
    };
  }

  /**
   * Structural check only: status and trigger, no guards
   */
  canApply(status: OrderStatus, event: OrderEvent, triggerType?: TriggerType): boolean {
    const rule = this.rules.get(event);
    if (!rule || !rule.from.includes(status)) {
      return false;
    }
    return triggerType === undefined || rule.triggers.includes(triggerType);
  }

  getNextStates(status: OrderStatus): OrderStatus[] {
    const next = new Set<OrderStatus>();
    for (const rule of this.rules.values()) {
      if (rule.from.includes(status)) {
        next.add(rule.to);
      }
    }
    return Array.from(next);
  }

  isTerminal(status: OrderStatus): boolean {
    return getTerminalStates().includes(status);
  }

  addGuard(event: OrderEvent, guard: TransitionGuard): void {
    const rule = this.getRule(event);
    rule.guards = [...(rule.guards ?? []), guard];
  }

  validateStatus(status: string): OrderStatus {
    const validStatuses = Object.values(OrderStatus);
    const match = validStatuses.find((candidate) => candidate === status);
    if (!match) {
      throw new InvalidStateError(`Invalid status: ${status}`, status, validStatuses);
    }
    return match;
  }

  getInitialState(): OrderStatus {
    return this.config.initialState;
  }

  getRules(): TransitionRule[] {
    return Array.from(this.rules.values());
  }

  toMermaidDiagram(): string {
    const lines = ['stateDiagram-v2'];
    lines.push(`    [*] --> ${this.config.initialState}`);

    for (const rule of this.rules.values()) {
      for (const from of rule.from) {
        lines.push(`    ${from} --> ${rule.to} : ${rule.event}`);
      }
    }

    for (const terminal of getTerminalStates()) {
      lines.push(`    ${terminal} --> [*]`);
    }

    return lines.join('\n');
  }

  private getRule(event: OrderEvent): TransitionRule {
    const rule = this.rules.get(event) ?? findRuleForEvent(event, this.config.rules);
    if (!rule) {
      throw new Error(`No transition rule defined for event ${event}`);
    }
    return rule;
  }

  private async checkGuards(
    guards: TransitionGuard[],
    context: TransitionContext,
  ): Promise<string[]> {
    const failures: string[] = [];

    for (const guard of guards) {
      try {
        const result = await guard.check(context);
        if (!result.allowed) {
          failures.push(result.reason ?? `Guard ${guard.name} blocked transition`);
        }
      } catch (error) {
        failures.push(
          `Guard ${guard.name} threw error: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    return failures;
  }
}

export const defaultStateMachine = new OrderStateMachine();
