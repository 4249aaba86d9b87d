import { hostname } from "node:os";
import getLogger from "@zfs-tiers/backend/logger";
import sendEmail from "@zfs-tiers/backend/email/smtp";
import type { Output } from "./output";

const logger = getLogger("zbackup:notify");

// Email recipient that zbackup failed.  Never throws: a broken mail setup
// is only reported, and the original failure is what the caller exits with.
export async function sendFailureEmail({
  recipient,
  message,
  host = hostname(),
  output,
}: {
  recipient: string;
  message: string;
  host?: string;
  output?: Output;
}): Promise<boolean> {
  try {
    await sendEmail({
      to: recipient,
      from: `root@${host}`,
      subject: `zbackup failed on ${host}`,
      text: message,
    });
    return true;
  } catch (err) {
    logger.error("sendFailureEmail: failed to send email", err);
    output?.warn(`failed to send failure email to ${recipient}: ${err}`);
    return false;
  }
}
