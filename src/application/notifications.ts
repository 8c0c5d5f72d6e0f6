import { logWarning } from "../infrastructure/logging/logger";
import { AuctionEvent, MemberContact, NotificationTarget, Notifier } from "./ports/services";

export type Notification = {
  target: NotificationTarget;
  event: AuctionEvent;
};

function describeTarget(target: NotificationTarget): string {
  switch (target.kind) {
    case "channel":
      return `channel:${target.channelId}`;
    case "user":
      return `user:${target.userId}@${target.channelId}`;
    case "results":
      return "results";
  }
}

async function deliver(notifier: Notifier, notification: Notification): Promise<void> {
  try {
    await notifier.notify(notification.target, notification.event);
  } catch (error) {
    logWarning("notification.failed", error, {
      target: describeTarget(notification.target),
      event: notification.event.type
    });
  }
}

/**
 * Sends every notification concurrently. Delivery failures are logged and
 * dropped; the returned promise never rejects.
 */
export async function dispatchNotifications(
  notifier: Notifier,
  notifications: Notification[]
): Promise<void> {
  await Promise.all(notifications.map((notification) => deliver(notifier, notification)));
}

export async function resolveMemberOrNull(
  notifier: Notifier,
  channelId: string,
  userId: string
): Promise<MemberContact | null> {
  try {
    return await notifier.resolveMember(channelId, userId);
  } catch (error) {
    logWarning("notification.resolve_failed", error, { channelId, userId });
    return null;
  }
}
