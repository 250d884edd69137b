/**
 * 测试用的 SMTP 会话实现，不产生任何网络连接
 */
import { SmtpTransactionError } from '../core/errors.js'
import type { ComposedMessage } from '../core/message.js'
import type {
  SmtpCredentials,
  SmtpSession,
  SmtpSessionFactory,
  SmtpSessionOptions,
} from '../core/smtp-session.js'

/**
 * 模拟服务器的行为
 */
export interface RecordingSessionConfig {
  /** connect 阶段抛出的错误 */
  connectError?: Error
  /** STARTTLS 阶段抛出的错误 */
  startTlsError?: Error
  /** 认证阶段抛出的错误 */
  authError?: Error
  /** 投递失败的收件人 */
  rejectedRecipients?: string[]
  /** 投递失败时的服务器响应 */
  rejectionMessage?: string
}

/**
 * 记录每一步调用的会话
 */
export class RecordingSession implements SmtpSession {
  readonly options: SmtpSessionOptions
  /** 按发生顺序记录的步骤，例如 connect、starttls、login、send:a@x.com、close */
  readonly events: string[] = []
  readonly messages: ComposedMessage[] = []
  credentials?: SmtpCredentials
  private config: RecordingSessionConfig

  constructor(options: SmtpSessionOptions, config: RecordingSessionConfig) {
    this.options = options
    this.config = config
  }

  async connect(): Promise<void> {
    this.events.push('connect')
    if (this.config.connectError) {
      throw new SmtpTransactionError('connect', this.config.connectError)
    }

    if (this.options.startTls) {
      this.events.push('starttls')
      if (this.config.startTlsError) {
        throw new SmtpTransactionError('starttls', this.config.startTlsError)
      }
    }
  }

  async login(credentials: SmtpCredentials): Promise<void> {
    this.events.push('login')
    this.credentials = credentials
    if (this.config.authError) {
      throw new SmtpTransactionError('auth', this.config.authError)
    }
  }

  async send(message: ComposedMessage): Promise<void> {
    const to = message.envelope.to
    this.events.push(`send:${to.join(',')}`)
    this.messages.push(message)

    const rejected = to.filter((r) => this.config.rejectedRecipients?.includes(r))
    if (rejected.length > 0) {
      const reason = this.config.rejectionMessage ?? '550 5.1.1 Mailbox unavailable'
      throw new SmtpTransactionError('send', new Error(reason))
    }
  }

  close(): void {
    this.events.push('close')
  }
}

/**
 * 生成 RecordingSession 并保留所有创建过的会话
 */
export class RecordingSessionFactory {
  readonly sessions: RecordingSession[] = []
  private config: RecordingSessionConfig

  constructor(config: RecordingSessionConfig = {}) {
    this.config = config
  }

  readonly create: SmtpSessionFactory = (options) => {
    const session = new RecordingSession(options, this.config)
    this.sessions.push(session)
    return session
  }

  /** 所有会话的步骤记录 */
  get events(): string[] {
    return this.sessions.flatMap((s) => s.events)
  }

  /** 发起过的连接次数 */
  get connectAttempts(): number {
    return this.events.filter((e) => e === 'connect').length
  }
}
