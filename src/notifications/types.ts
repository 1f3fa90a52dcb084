export type Severity = 'info' | 'success' | 'warning' | 'error';

export interface Notification {
  title: string;
  body: string;
  severity: Severity;
  /** Delete the message from the recipient's view after this many ms. */
  ephemeralTtlMs?: number;
}

export const SEVERITY_COLORS: Record<Severity, string> = {
  success: '#00FF00',
  error: '#FF0000',
  warning: '#FFA500',
  info: '#00FFFF',
};

/** Delivers one notification to the operator; rejects on failure. */
export interface ChatTransport {
  deliver(notification: Notification, signal: AbortSignal): Promise<void>;
}

/** Where status reports go when they are not plain notifications. */
export interface StatusOutbox {
  report(notification: Notification): Promise<void>;
}
