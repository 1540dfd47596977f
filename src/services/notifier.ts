import { isEmailConfigured, isSmsConfigured } from "../config.js";
import { errorMessage, log } from "../log.js";
import type { NotificationDispatcher, TriggerEvent } from "../types.js";
import { sendEmailAlert } from "./email-sender.js";
import { sendSmsAlert } from "./sms-sender.js";
import { formatTriggerMessage } from "./trigger-message.js";

export interface NotificationChannel {
  name: string;
  send(event: TriggerEvent): Promise<void>;
}

/** Delivers to every channel; succeeds when at least one channel does. */
export class ChannelDispatcher implements NotificationDispatcher {
  constructor(private readonly channels: NotificationChannel[]) {}

  async deliver(event: TriggerEvent): Promise<boolean> {
    log.info(`[ALERT] ${formatTriggerMessage(event)} -> owner ${event.alert.ownerId}`);

    let anySucceeded = false;
    for (const channel of this.channels) {
      try {
        await channel.send(event);
        log.info(`  -> ${channel.name} sent`);
        anySucceeded = true;
      } catch (err) {
        log.error(`  -> ${channel.name} failed: ${errorMessage(err)}`);
      }
    }
    return anySucceeded;
  }
}

export function createDefaultDispatcher(): ChannelDispatcher {
  const channels: NotificationChannel[] = [];
  if (isEmailConfigured()) channels.push({ name: "Email", send: sendEmailAlert });
  if (isSmsConfigured()) channels.push({ name: "SMS", send: sendSmsAlert });
  return new ChannelDispatcher(channels);
}
