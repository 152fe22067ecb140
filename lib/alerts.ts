import { Resend } from "resend";

import { env } from "@/lib/env";

const ALERT_TIMEOUT_MS = 12_000;

const resend = env.RESEND_API_KEY ? new Resend(env.RESEND_API_KEY) : null;

export async function sendAdminAlert(subject: string, html: string): Promise<void> {
  if (!resend || !env.ALERT_FROM_EMAIL || !env.ALERT_TO_EMAIL) {
    console.warn("[alerts] missing resend configuration", { subject });
    return;
  }

  const { error } = await resend.emails.send({
    from: env.ALERT_FROM_EMAIL,
    to: env.ALERT_TO_EMAIL,
    subject,
    html
  });

  if (error) {
    throw new Error(`Resend rejected alert: ${error.message}`);
  }
}

/**
 * Sends an alert without ever failing or stalling the caller: errors are
 * logged and the wait is capped.
 */
export async function sendAdminAlertWithTimeout(subject: string, html: string): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ALERT_TIMEOUT_MS);
  });

  try {
    await Promise.race([sendAdminAlert(subject, html), timeoutPromise]);
  } catch (error) {
    console.warn("[alerts] failed to send admin alert", {
      subject,
      error: error instanceof Error ? error.message : "unknown"
    });
  } finally {
    clearTimeout(timer);
  }
}
