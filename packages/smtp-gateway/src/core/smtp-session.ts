import type { ConnectionOptions } from 'node:tls'
import SMTPConnection from 'nodemailer/lib/smtp-connection/index.js'
import { SmtpTransactionError, errorMessage, type SmtpStage } from './errors.js'
import type { ComposedMessage } from './message.js'

/**
 * 建立会话所需的参数
 */
export interface SmtpSessionOptions {
  host: string
  port: number
  /** 认证前是否通过 STARTTLS 升级连接 */
  startTls: boolean
  /** 连接、问候及 socket 超时（毫秒） */
  timeoutMs: number
  /** STARTTLS 升级时的 TLS 选项，例如自签名证书的校验方式 */
  tls?: ConnectionOptions
}

export interface SmtpCredentials {
  user: string
  pass: string
}

/**
 * SMTP 会话
 *
 * 生命周期：connect（含可选的 STARTTLS）→ login → send（可多次）→ close。
 * 任一步骤失败都会抛出 SmtpTransactionError。
 */
export interface SmtpSession {
  connect(): Promise<void>
  login(credentials: SmtpCredentials): Promise<void>
  send(message: ComposedMessage): Promise<void>
  /** 关闭会话，可重复调用 */
  close(): void
}

/**
 * 创建会话（不产生网络连接，连接由 connect 发起）
 */
export type SmtpSessionFactory = (options: SmtpSessionOptions) => SmtpSession

type Callback<T> = (err: Error | null | undefined, value: T) => void

/**
 * 基于 nodemailer SMTPConnection 的会话实现
 */
export class NodemailerSmtpSession implements SmtpSession {
  private connection: SMTPConnection
  private connected = false
  private ended = false
  private closed = false
  private rejectPending?: (err: Error) => void

  constructor(options: SmtpSessionOptions) {
    this.connection = new SMTPConnection({
      host: options.host,
      port: options.port,
      secure: false,
      // STARTTLS 是否执行完全由调用方决定，不跟随服务器的 EHLO 能力
      requireTLS: options.startTls,
      ignoreTLS: !options.startTls,
      connectionTimeout: options.timeoutMs,
      greetingTimeout: options.timeoutMs,
      socketTimeout: options.timeoutMs,
      tls: options.tls,
    })

    // 未处理的 error 事件会导致进程退出，这里统一转交给当前等待中的操作
    this.connection.on('error', (err: Error) => {
      if (this.rejectPending) {
        this.rejectPending(err)
      } else {
        console.error(`SMTP connection error: ${err.message}`)
      }
    })

    this.connection.on('end', () => {
      this.ended = true
      this.rejectPending?.(new Error('Connection closed unexpectedly'))
    })
  }

  async connect(): Promise<void> {
    await this.call<void>('connect', (done) => {
      // nodemailer 只在连接成功时调用该回调，失败通过 error 事件通知
      this.connection.connect(() => done(null, undefined))
    })
    this.connected = true
  }

  async login(credentials: SmtpCredentials): Promise<void> {
    await this.call<void>('auth', (done) => {
      this.connection.login(
        { user: credentials.user, pass: credentials.pass },
        (err) => done(err, undefined)
      )
    })
  }

  async send(message: ComposedMessage): Promise<void> {
    try {
      await this.call<void>('send', (done) => {
        this.connection.send(message.envelope, message.raw, (err) => done(err, undefined))
      })
    } catch (error) {
      await this.reset()
      throw error
    }
  }

  close(): void {
    if (this.closed) return
    this.closed = true

    if (this.connected && !this.ended) {
      this.connection.quit()
    } else {
      this.connection.close()
    }
  }

  /**
   * 失败的事务之后发送 RSET，保证下一封邮件从干净的状态开始
   */
  private async reset(): Promise<void> {
    if (this.ended) return

    try {
      await this.call<void>('send', (done) => {
        this.connection.reset((err) => done(err, undefined))
      })
    } catch (error) {
      console.error(`SMTP RSET failed: ${errorMessage(error)}`)
    }
  }

  private call<T>(stage: SmtpStage, invoke: (done: Callback<T>) => void): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const fail = (err: Error) => {
        this.rejectPending = undefined
        reject(new SmtpTransactionError(stageOf(stage, err), err))
      }

      if (this.ended) {
        fail(new Error('Connection is closed'))
        return
      }

      this.rejectPending = fail
      invoke((err, value) => {
        if (err) {
          fail(err)
          return
        }
        this.rejectPending = undefined
        resolve(value)
      })
    })
  }
}

/**
 * nodemailer 以 ETLS 标记 STARTTLS 失败，它发生在 connect 阶段内部
 */
function stageOf(stage: SmtpStage, err: Error): SmtpStage {
  if (stage === 'connect' && 'code' in err && err.code === 'ETLS') {
    return 'starttls'
  }
  return stage
}

/**
 * 默认的会话工厂
 */
export const createNodemailerSession: SmtpSessionFactory = (options) =>
  new NodemailerSmtpSession(options)

/**
 * 在一个已认证的会话中执行操作
 *
 * 无论连接、认证还是 fn 本身失败，会话都会被关闭且只关闭一次。
 */
export async function withSmtpSession<T>(
  factory: SmtpSessionFactory,
  options: SmtpSessionOptions,
  credentials: SmtpCredentials,
  fn: (session: SmtpSession) => Promise<T>
): Promise<T> {
  const session = factory(options)

  try {
    await session.connect()
    await session.login(credentials)
    return await fn(session)
  } finally {
    session.close()
  }
}
