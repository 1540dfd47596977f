import nodemailer from "nodemailer";
import { config } from "../config.js";
import type { TriggerEvent } from "../types.js";
import { currencySymbol } from "./exchanges.js";

let transporter: nodemailer.Transporter | null = null;

function getTransporter(): nodemailer.Transporter {
  if (!transporter) {
    transporter = nodemailer.createTransport({
      host: config.smtp.host,
      port: config.smtp.port,
      secure: config.smtp.port === 465,
      auth: {
        user: config.smtp.user,
        pass: config.smtp.pass,
      },
    });
  }
  return transporter;
}

export async function sendEmailAlert({ alert, observedPrice }: TriggerEvent): Promise<void> {
  const sym = currencySymbol(alert.currency);
  const movement = alert.direction === "above" ? "rose to or above" : "fell to or below";

  const subject = `Price alert: ${alert.ticker} ${movement} ${alert.targetPrice.toFixed(2)} ${sym}`;
  const text = [
    `${alert.ticker} (${alert.companyName}, ${alert.exchange})`,
    `Target:  ${alert.targetPrice.toFixed(2)} ${sym}`,
    `Current: ${observedPrice.toFixed(2)} ${sym}`,
    ``,
    `The alert has fired and is now inactive. Set a new target to keep watching ${alert.ticker}.`,
  ].join("\n");

  await getTransporter().sendMail({
    from: config.smtp.user,
    to: config.notifyEmail,
    subject,
    text,
  });
}
