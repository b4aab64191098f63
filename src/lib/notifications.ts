import nodemailer, { type SendMailOptions } from "nodemailer"
import type { AlertLog } from "./alert-log"
import type { SmtpSettings } from "./config"
import { formatDate } from "./date-utils"
import type { AlertEvent } from "./monitor/alerts"

const DEFAULT_COOLDOWN_MINUTES = 15

// nodemailer's Transporter satisfies this
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>
}

export interface AlertNotifierOptions {
  cooldownMinutes?: number
  transport?: MailTransport
  now?: () => Date
}

export interface EmailHealth {
  consecutiveFailures: number
  lastError: string | null
}

export function createSmtpTransport(settings: SmtpSettings): MailTransport {
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    auth: settings.username ? { user: settings.username, pass: settings.password } : undefined,
  })
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
}

export function alertSubject(metricName: string, serverName: string): string {
  return `[SQL Monitor Alert] ${metricName} on ${serverName}`
}

export function alertEmailText(metricName: string, serverName: string, currentValue: string, thresholdValue: string, at: Date): string {
  return [
    `${metricName} on ${serverName}`,
    "",
    `Current value: ${currentValue}`,
    `Threshold: ${thresholdValue}`,
    `Time: ${formatDate(at)}`,
  ].join("\n")
}

// HTML template for alert email
export function alertEmailHtml(metricName: string, serverName: string, currentValue: string, thresholdValue: string, at: Date): string {
  return `
    <!DOCTYPE html>
    <html>
    <head>
      <meta charset="utf-8">
    </head>
    <body style="margin: 0; padding: 0; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; background-color: #f5f5f5;">
      <div style="max-width: 600px; margin: 0 auto; padding: 20px;">
        <div style="background-color: #ffffff; border-radius: 12px; box-shadow: 0 2px 8px rgba(0,0,0,0.1); overflow: hidden;">
          <div style="background-color: #dc2626; padding: 20px 24px;">
            <h1 style="margin: 0; color: #ffffff; font-size: 20px;">${escapeHtml(metricName)}</h1>
            <p style="margin: 6px 0 0 0; color: #fecaca; font-size: 14px;">${escapeHtml(serverName)}</p>
          </div>
          <table style="width: 100%; border-collapse: collapse; font-size: 13px;">
            <tr style="border-bottom: 1px solid #e2e8f0;">
              <td style="padding: 10px 24px; color: #64748b;">Current value</td>
              <td style="padding: 10px 24px; font-weight: 600; color: #334155;">${escapeHtml(currentValue)}</td>
            </tr>
            <tr style="border-bottom: 1px solid #e2e8f0;">
              <td style="padding: 10px 24px; color: #64748b;">Threshold</td>
              <td style="padding: 10px 24px; color: #334155;">${escapeHtml(thresholdValue)}</td>
            </tr>
            <tr>
              <td style="padding: 10px 24px; color: #64748b;">Time</td>
              <td style="padding: 10px 24px; color: #334155;">${escapeHtml(formatDate(at))}</td>
            </tr>
          </table>
        </div>
      </div>
    </body>
    </html>
  `
}

/**
 * Records every alert event in the alert log and emails new breaches.
 * Email goes out once per server and metric within the cooldown window.
 * Never throws: delivery failures end up in the log and the console.
 */
export class AlertNotifier {
  private readonly cooldowns = new Map<string, Date>()
  private readonly cooldownMs: number
  private readonly now: () => Date
  private transport: MailTransport | null
  private consecutiveFailures = 0
  private lastError: string | null = null

  constructor(
    private readonly settings: SmtpSettings,
    private readonly log: AlertLog,
    options: AlertNotifierOptions = {}
  ) {
    this.cooldownMs = (options.cooldownMinutes ?? DEFAULT_COOLDOWN_MINUTES) * 60_000
    this.transport = options.transport ?? null
    this.now = options.now ?? (() => new Date())
  }

  get emailConfigured(): boolean {
    const s = this.settings
    return s.enabled && !!s.host.trim() && !!s.from.trim() && s.recipients.length > 0
  }

  emailHealth(): EmailHealth {
    return { consecutiveFailures: this.consecutiveFailures, lastError: this.lastError }
  }

  async notify(event: AlertEvent): Promise<void> {
    this.log.record({
      alertTime: this.now(),
      serverId: event.serverId,
      serverName: event.serverName,
      metricName: event.metric,
      currentValue: event.currentValue,
      thresholdValue: event.thresholdValue,
      alertSent: true,
      notificationType: "notification",
      sendError: null,
    })

    if (event.kind === "alert") {
      await this.trySendAlertEmail(event.metric, event.serverName, event.currentValue, event.thresholdValue, event.serverId)
    }
  }

  async trySendAlertEmail(
    metricName: string,
    serverName: string,
    currentValue: string,
    thresholdValue: string,
    serverId = ""
  ): Promise<void> {
    if (!this.emailConfigured) return

    const now = this.now()
    const cooldownKey = `${serverId}:${metricName}`
    const lastSent = this.cooldowns.get(cooldownKey)
    if (lastSent && now.getTime() - lastSent.getTime() < this.cooldownMs) return

    let sent = false
    let sendError: string | null = null

    try {
      await this.send(
        alertSubject(metricName, serverName),
        alertEmailHtml(metricName, serverName, currentValue, thresholdValue, now),
        alertEmailText(metricName, serverName, currentValue, thresholdValue, now)
      )
      sent = true
      this.cooldowns.set(cooldownKey, now)

      if (this.consecutiveFailures > 0) {
        console.log(`[Alerts] Alert email delivery recovered after ${this.consecutiveFailures} failure(s)`)
      }
      this.consecutiveFailures = 0
      this.lastError = null
      console.log(`[Alerts] Alert email sent for ${metricName} on ${serverName}`)
    } catch (error) {
      sendError = error instanceof Error ? error.message : "Email send failed"
      this.consecutiveFailures++
      this.lastError = sendError

      // Loud for the first few, then a periodic reminder
      if (this.consecutiveFailures <= 3) {
        console.error(`[Alerts] Alert email failed (${this.consecutiveFailures}x):`, sendError)
      } else if (this.consecutiveFailures % 50 === 0) {
        console.error(`[Alerts] Alert email still failing: ${this.consecutiveFailures} consecutive failures. Last error:`, sendError)
      }
    }

    this.log.record({
      alertTime: now,
      serverId,
      serverName,
      metricName,
      currentValue,
      thresholdValue,
      alertSent: sent,
      notificationType: "email",
      sendError,
    })
  }

  // Returns null on success, otherwise the reason
  async sendTestEmail(): Promise<string | null> {
    if (!this.settings.host.trim()) return "SMTP server is not configured."
    if (!this.settings.from.trim()) return "From address is not configured."
    if (this.settings.recipients.length === 0) return "No recipients configured."

    try {
      await this.send(
        "[SQL Monitor] Test Email",
        "<p>SMTP settings are working. Alert email will be delivered to this address.</p>",
        "SMTP settings are working. Alert email will be delivered to this address."
      )
      console.log(`[Alerts] Test email sent to ${this.settings.recipients.join(", ")}`)
      return null
    } catch (error) {
      console.error("[Alerts] Test email failed:", error)
      return error instanceof Error ? error.message : "Email send failed"
    }
  }

  private async send(subject: string, html: string, text: string): Promise<void> {
    if (!this.transport) {
      this.transport = createSmtpTransport(this.settings)
    }
    await this.transport.sendMail({
      from: this.settings.from,
      to: this.settings.recipients.join(", "),
      subject,
      html,
      text,
    })
  }
}
