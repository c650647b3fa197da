/**
 * Rendered alert handed to a delivery channel
 */
export interface AlertMessage {
  title: string;
  message: string;
  /** Short key/value summary */
  detail: Record<string, string>;
}

/**
 * Outbound notification channel
 */
export interface Notifier {
  /**
   * Delivers an alert.
   * @returns true only when the channel accepted the message
   */
  send(alert: AlertMessage): Promise<boolean>;
}
