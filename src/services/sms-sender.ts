import twilio from "twilio";
import { config } from "../config.js";
import type { TriggerEvent } from "../types.js";
import { formatTriggerMessage } from "./trigger-message.js";

let client: ReturnType<typeof twilio> | null = null;

function getClient() {
  if (!client) {
    client = twilio(config.twilio.accountSid, config.twilio.authToken);
  }
  return client;
}

export async function sendSmsAlert(event: TriggerEvent): Promise<void> {
  const to = config.notifySms;
  if (!to) throw new Error("NOTIFY_SMS is not set");

  await getClient().messages.create({
    body: `Price alert: ${formatTriggerMessage(event)}`,
    from: config.twilio.fromNumber,
    to,
  });
}
