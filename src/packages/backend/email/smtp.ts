import { createTransport } from "nodemailer";
import type { Transporter } from "nodemailer";
import { envToInt } from "../misc/env-to-number";
import type { Message } from "./message";

export interface Settings {
  server: string;
  port: number;
}

// The local mail relay, as for any cron job.  Override with
// ZBACKUP_SMTP_HOST and ZBACKUP_SMTP_PORT.
export function getSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    server: env.ZBACKUP_SMTP_HOST || "localhost",
    port: envToInt("ZBACKUP_SMTP_PORT", 25, env),
  };
}

let server: undefined | Transporter = undefined;
let cacheSettings = ""; // what settings were used to compute cached server.
function getServer(settings: Settings): Transporter {
  const s = JSON.stringify(settings);
  if (server !== undefined && s == cacheSettings) return server;
  server = createTransport({
    host: settings.server,
    port: settings.port,
    secure: settings.port == 465,
  });
  cacheSettings = s;
  return server;
}

export default async function sendEmail(
  message: Message,
  settings: Settings = getSettings(),
): Promise<void> {
  await getServer(settings).sendMail(message);
}
