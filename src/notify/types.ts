export interface StockAlert {
  productName: string;
  url: string;
  /** Reason text from the verdict that triggered the alert. */
  reason: string;
  checkedAt: Date;
}

export interface NotificationChannel {
  readonly name: string;
  /** Resolves `false` when the alert was not delivered; never rejects for delivery errors. */
  send(alert: StockAlert): Promise<boolean>;
}

/** `YYYY-MM-DD HH:mm:ss` in local time. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
