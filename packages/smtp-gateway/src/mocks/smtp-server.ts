import { SMTPServer, type SMTPServerDataStream, type SMTPServerSession } from 'smtp-server'

/**
 * 服务器收到的一封邮件
 */
export interface ReceivedMessage {
  from: string
  to: string[]
  raw: Buffer
}

export interface TestSmtpServerOptions {
  user?: string
  pass?: string
  /** RCPT TO 阶段以 550 拒绝的地址 */
  rejectedRecipients?: string[]
  /** 是否提供 STARTTLS（默认 true，使用 smtp-server 自带的自签名证书） */
  starttls?: boolean
}

/**
 * 监听 127.0.0.1 随机端口的 SMTP 服务器，记录认证、投递与断开
 */
export class TestSmtpServer {
  readonly messages: ReceivedMessage[] = []
  /** 认证成功的用户，以及认证时连接是否已加密 */
  readonly logins: { user: string; secure: boolean }[] = []
  authAttempts = 0
  closedConnections = 0

  private server: SMTPServer
  private stopped = false

  constructor(options: TestSmtpServerOptions = {}) {
    const user = options.user ?? 'sender'
    const pass = options.pass ?? 'test-password'
    const rejected = new Set(options.rejectedRecipients ?? [])

    this.server = new SMTPServer({
      logger: false,
      // 停止时不等待残留连接
      closeTimeout: 100,
      allowInsecureAuth: true,
      disabledCommands: options.starttls === false ? ['STARTTLS'] : [],
      onAuth: (auth, session, callback) => {
        this.authAttempts += 1
        if (auth.username !== user || auth.password !== pass) {
          callback(new Error('Invalid username or password'))
          return
        }
        this.logins.push({ user, secure: session.secure })
        callback(null, { user })
      },
      onRcptTo: (address, _session, callback) => {
        if (rejected.has(address.address)) {
          callback(Object.assign(new Error('Mailbox unavailable'), { responseCode: 550 }))
          return
        }
        callback()
      },
      onData: (stream, session, callback) => {
        this.receive(stream, session).then(
          () => callback(),
          (error: unknown) => callback(error instanceof Error ? error : new Error(String(error)))
        )
      },
      onClose: () => {
        this.closedConnections += 1
      },
    })
  }

  /**
   * 开始监听，返回实际端口
   */
  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject)
      this.server.listen(0, '127.0.0.1', () => {
        const address = this.server.server.address()
        if (address === null || typeof address === 'string') {
          reject(new Error('SMTP server has no TCP address'))
          return
        }
        resolve(address.port)
      })
    })
  }

  stop(): Promise<void> {
    if (this.stopped) return Promise.resolve()
    this.stopped = true
    return new Promise((resolve) => this.server.close(() => resolve()))
  }

  private async receive(stream: SMTPServerDataStream, session: SMTPServerSession): Promise<void> {
    const chunks: Buffer[] = []
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
    }

    const { mailFrom, rcptTo } = session.envelope
    this.messages.push({
      from: mailFrom ? mailFrom.address : '',
      to: rcptTo.map((rcpt) => rcpt.address),
      raw: Buffer.concat(chunks),
    })
  }
}
