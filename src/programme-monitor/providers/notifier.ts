/** `emailed` is false when the message was only written to the log. */
export type NotifyOutcome = {
  emailed: boolean;
  info: string;
};

/**
 * Sends one alert message. Rejects with `NotifyError`. Callers retry, so a
 * send may be repeated for the same logical message.
 */
export interface Notifier {
  send(recipients: readonly string[], subject: string, body: string): Promise<NotifyOutcome>;
}
