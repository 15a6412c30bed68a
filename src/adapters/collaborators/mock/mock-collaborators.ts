import {
  CallOptions,
  ContentGenerator,
  DeliveryResult,
  EnrichmentProvider,
  JsonObject,
  MessageKind,
  NotificationPayload,
  Notifier,
} from '../../../core';
import { ScriptedBehavior } from './scripted-behavior';

export class MockEnrichmentProvider implements EnrichmentProvider {
  readonly name = 'mock-enrichment';
  readonly behavior = new ScriptedBehavior('enrichment');
  readonly calls: JsonObject[] = [];

  constructor(private readonly data: JsonObject = { source: 'mock' }) {}

  async fetchEnrichmentData(input: JsonObject, options: CallOptions = {}): Promise<JsonObject> {
    this.calls.push(input);
    await this.behavior.run(options.signal);
    return { ...this.data };
  }
}

export type ContentFactory = (input: JsonObject, enrichmentData: JsonObject | null) => string;

export const defaultMockContent: ContentFactory = (input, enrichmentData) =>
  `Report for ${JSON.stringify(input)}${enrichmentData ? ` using ${JSON.stringify(enrichmentData)}` : ''}`;

export class MockContentGenerator implements ContentGenerator {
  readonly name = 'mock-content';
  readonly behavior = new ScriptedBehavior('generation');
  readonly calls: Array<{ input: JsonObject; enrichmentData: JsonObject | null }> = [];

  constructor(private readonly contentFactory: ContentFactory = defaultMockContent) {}

  async generateContent(
    input: JsonObject,
    enrichmentData: JsonObject | null,
    options: CallOptions = {},
  ): Promise<string> {
    this.calls.push({ input, enrichmentData });
    await this.behavior.run(options.signal);
    return this.contentFactory(input, enrichmentData);
  }
}

export interface SentMessage {
  userRef: string;
  kind: MessageKind;
  payload: NotificationPayload;
  result: DeliveryResult;
}

/**
 * Records every message. Scripted failures throw; `failedResults` queues
 * 'failed' results without throwing.
 */
export class MockNotifier implements Notifier {
  readonly name = 'mock-notifier';
  readonly behavior = new ScriptedBehavior('notify');
  readonly sent: SentMessage[] = [];
  private failedResults = 0;

  async notify(
    userRef: string,
    kind: MessageKind,
    payload: NotificationPayload,
    options: CallOptions = {},
  ): Promise<DeliveryResult> {
    await this.behavior.run(options.signal);

    const result: DeliveryResult = this.failedResults > 0 ? 'failed' : 'delivered';
    if (this.failedResults > 0) {
      this.failedResults--;
    }
    this.sent.push({ userRef, kind, payload, result });
    return result;
  }

  reportFailedDelivery(times = 1): void {
    this.failedResults += times;
  }

  kinds(orderId?: string): MessageKind[] {
    return this.sent
      .filter((message) => orderId === undefined || message.payload.orderId === orderId)
      .map((message) => message.kind);
  }
}
