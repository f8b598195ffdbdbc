/**
 * Notifier port: chat/webhook channel that receives threshold alerts.
 */
export interface AlertNotifier {
  /**
   * Post one message. Resolves to whether the channel accepted it;
   * delivery failures are logged by the adapter, never thrown.
   */
  send(text: string): Promise<boolean>;
  /** Whether a destination is configured */
  readonly enabled: boolean;
}
