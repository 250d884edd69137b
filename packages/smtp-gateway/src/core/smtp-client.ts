import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { resolveSmtpSettings, type AppConfig, type SmtpSettings } from './config.js'
import {
  AttachmentNotFoundError,
  NoRecipientsError,
  errorMessage,
  toError,
} from './errors.js'
import { composeMessage, type BodyType, type MessageAttachment } from './message.js'
import {
  createNodemailerSession,
  withSmtpSession,
  type SmtpSession,
  type SmtpSessionFactory,
} from './smtp-session.js'

/**
 * 发送邮件选项
 */
export interface SendEmailOptions {
  /** 收件人 */
  to: string
  /** 主题 */
  subject: string
  /** 正文 */
  body: string
  /** 认证前是否执行 STARTTLS（默认 true） */
  useTls?: boolean
  /** 正文类型（默认 plain） */
  bodyType?: BodyType
}

/**
 * 发送带附件邮件选项（正文固定为纯文本）
 */
export interface SendAttachmentOptions extends Omit<SendEmailOptions, 'bodyType'> {
  /** 本地附件路径 */
  attachmentPath: string
}

/**
 * 群发选项
 */
export interface SendBulkOptions {
  /** 逗号分隔的收件人列表 */
  recipients: string
  subject: string
  body: string
  useTls?: boolean
}

/**
 * 单封发送结果
 */
export type SendResult =
  | { success: true; recipient: string; messageId: string; attachment?: string }
  | { success: false; recipient: string; error: Error }

/**
 * 群发中单个收件人的失败记录
 */
export interface BulkFailure {
  recipient: string
  error: string
}

/**
 * 群发结果
 *
 * 会话建立成功时，每个收件人恰好出现在 successful 或 failed 之一；
 * 会话建立失败时不会尝试任何收件人。
 */
export type BulkSendResult =
  | { success: true; successful: string[]; failed: BulkFailure[] }
  | { success: false; error: Error }

/**
 * 解析逗号分隔的收件人，去除首尾空白并忽略空项
 */
export function parseRecipients(recipients: string): string[] {
  return recipients
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

/**
 * SMTP 发送客户端
 *
 * 每次调用都会重新校验配置并建立独立的会话，调用之间不共享连接。
 */
export class SmtpClient {
  private config: AppConfig
  private sessionFactory: SmtpSessionFactory

  constructor(config: AppConfig, sessionFactory: SmtpSessionFactory = createNodemailerSession) {
    this.config = config
    this.sessionFactory = sessionFactory
  }

  /**
   * 发送邮件
   */
  async sendEmail(options: SendEmailOptions): Promise<SendResult> {
    try {
      const settings = resolveSmtpSettings(this.config)

      const message = await composeMessage({
        from: settings.from,
        to: options.to,
        subject: options.subject,
        body: options.body,
        bodyType: options.bodyType ?? 'plain',
      })

      await this.withSession(settings, options.useTls ?? true, async (session) => {
        await session.send(message)
      })

      return { success: true, recipient: options.to, messageId: message.messageId }
    } catch (error) {
      return { success: false, recipient: options.to, error: toError(error) }
    }
  }

  /**
   * 发送带附件的邮件
   *
   * 附件不存在时直接返回失败，不会建立连接。
   */
  async sendEmailWithAttachment(options: SendAttachmentOptions): Promise<SendResult> {
    try {
      const settings = resolveSmtpSettings(this.config)
      const attachment = await readAttachment(options.attachmentPath)

      const message = await composeMessage({
        from: settings.from,
        to: options.to,
        subject: options.subject,
        body: options.body,
        bodyType: 'plain',
        attachment,
      })

      await this.withSession(settings, options.useTls ?? true, async (session) => {
        await session.send(message)
      })

      return {
        success: true,
        recipient: options.to,
        messageId: message.messageId,
        attachment: attachment.filename,
      }
    } catch (error) {
      return { success: false, recipient: options.to, error: toError(error) }
    }
  }

  /**
   * 群发邮件
   *
   * 所有收件人共用一个已认证的会话，按给定顺序逐个发送。单个收件人失败
   * 只记录原因，不会中断后续发送，也不会重新认证。
   */
  async sendBulkEmails(options: SendBulkOptions): Promise<BulkSendResult> {
    try {
      const settings = resolveSmtpSettings(this.config)
      const recipients = parseRecipients(options.recipients)
      if (recipients.length === 0) {
        throw new NoRecipientsError()
      }

      const report = await this.withSession(settings, options.useTls ?? true, async (session) => {
        const successful: string[] = []
        const failed: BulkFailure[] = []

        for (const recipient of recipients) {
          try {
            const message = await composeMessage({
              from: settings.from,
              to: recipient,
              subject: options.subject,
              body: options.body,
              bodyType: 'plain',
            })
            await session.send(message)
            successful.push(recipient)
          } catch (error) {
            failed.push({ recipient, error: errorMessage(error) })
          }
        }

        return { successful, failed }
      })

      return { success: true, ...report }
    } catch (error) {
      return { success: false, error: toError(error) }
    }
  }

  private withSession<T>(
    settings: SmtpSettings,
    useTls: boolean,
    fn: (session: SmtpSession) => Promise<T>
  ): Promise<T> {
    return withSmtpSession(
      this.sessionFactory,
      {
        host: settings.host,
        port: settings.port,
        startTls: useTls,
        timeoutMs: settings.timeoutMs,
      },
      { user: settings.username, pass: settings.password },
      fn
    )
  }
}

/**
 * 读取附件内容，文件名取路径的最后一段
 */
async function readAttachment(path: string): Promise<MessageAttachment> {
  try {
    const content = await readFile(path)
    return { filename: basename(path), content }
  } catch (error) {
    if (isMissingFile(error)) {
      throw new AttachmentNotFoundError(path)
    }
    throw error
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}
