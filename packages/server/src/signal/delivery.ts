import type { WsServerMessage } from "@lamplight/shared";

import type { RegisteredConnection } from "../ws/types.js";

export type SendResult =
  | { ok: true; recipient: RegisteredConnection }
  | { ok: false; recipient: RegisteredConnection; error: unknown };

export interface DeliveryReport {
  delivered: number;
  failed: Array<{ identity: string; error: unknown }>;
}

export interface Delivery {
  recipient: RegisteredConnection;
  message: WsServerMessage;
}

function sendOne(delivery: Delivery): SendResult {
  const { recipient, message } = delivery;
  try {
    recipient.connection.send(JSON.stringify(message));
    return { ok: true, recipient };
  } catch (error: unknown) {
    return { ok: false, recipient, error };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sends every delivery in order. A failed send is logged and recorded; it never
 * stops the remaining sends and never removes the recipient from the registry.
 */
export function deliverAll(deliveries: readonly Delivery[]): DeliveryReport {
  const report: DeliveryReport = { delivered: 0, failed: [] };

  for (const result of deliveries.map(sendOne)) {
    if (result.ok) {
      report.delivered++;
      continue;
    }
    const { identity } = result.recipient;
    console.warn(`Failed to send to ${identity}: ${describeError(result.error)}`);
    report.failed.push({ identity, error: result.error });
  }

  return report;
}

export function toEveryone(
  recipients: readonly RegisteredConnection[],
  message: WsServerMessage,
): Delivery[] {
  return recipients.map((recipient) => ({ recipient, message }));
}
