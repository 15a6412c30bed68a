import { PipelineStage, SideEffectScheduler, StageResult, WebhookContext } from '../types';

/**
 * Stage 6: Dispatch
 * Hands the committed transition's side effects to the fulfillment queue and
 * returns without waiting for them
 */
export class DispatchStage implements PipelineStage {
  name = 'dispatch';

  constructor(private readonly scheduler?: SideEffectScheduler) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const outcome = context.outcome;
    if (!outcome || outcome.kind !== 'applied' || !this.scheduler) {
      return { success: true, context, shouldContinue: false, metadata: { scheduled: [] } };
    }

    this.scheduler.schedule(outcome.order.id, outcome.sideEffects);

    return {
      success: true,
      context,
      shouldContinue: false,
      metadata: { scheduled: outcome.sideEffects },
    };
  }
}
