import { MessageKind } from '../domain/enums';
import { JsonObject } from '../domain/models';

/**
 * Options accepted by every outbound collaborator call.
 * Implementations must stop work and reject once the signal aborts.
 */
export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Fetches auxiliary data the content generator needs for some products
 */
export interface EnrichmentProvider {
  readonly name: string;
  fetchEnrichmentData(input: JsonObject, options?: CallOptions): Promise<JsonObject>;
}

/**
 * Produces the report content for an order
 */
export interface ContentGenerator {
  readonly name: string;
  generateContent(
    input: JsonObject,
    enrichmentData: JsonObject | null,
    options?: CallOptions,
  ): Promise<string>;
}

export interface NotificationPayload {
  orderId: string;
  text: string;
  data?: JsonObject;
}

export type DeliveryResult = 'delivered' | 'failed';

/**
 * Sends messages to the user who placed an order
 */
export interface Notifier {
  readonly name: string;
  notify(
    userRef: string,
    kind: MessageKind,
    payload: NotificationPayload,
    options?: CallOptions,
  ): Promise<DeliveryResult>;
}
