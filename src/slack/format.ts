import { SEVERITY_COLORS, type Notification } from '../notifications/types.js';
import type { SlackAttachment } from './types.js';

export interface FooterOptions {
  footerText: string;
  footerIcon: string;
}

/** Slack's closest equivalent of a colored embed. */
export function buildAttachment(notification: Notification, footer: FooterOptions, nowMs: number = Date.now()): SlackAttachment {
  const attachment: SlackAttachment = {
    color: SEVERITY_COLORS[notification.severity],
    title: notification.title,
    text: notification.body,
    footer: footer.footerText,
    ts: String(Math.floor(nowMs / 1000)),
  };
  if (footer.footerIcon) {
    attachment.footer_icon = footer.footerIcon;
  }
  return attachment;
}

export function fallbackText(notification: Notification, mentionUserId?: string): string {
  return mentionUserId ? `<@${mentionUserId}> ${notification.title}` : notification.title;
}
