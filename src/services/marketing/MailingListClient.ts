export interface MailingListClient {
  /** True when the vendor accepted the subscription; never rejects. */
  subscribe(email: string, source?: string): Promise<boolean>;
}
