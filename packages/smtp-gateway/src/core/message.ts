import MimeNode from 'nodemailer/lib/mime-node/index.js'

/**
 * 正文类型
 */
export type BodyType = 'plain' | 'html'

/**
 * 待附加的文件
 */
export interface MessageAttachment {
  /** 文件名（写入 Content-Disposition） */
  filename: string
  /** 文件原始内容 */
  content: Buffer
}

/**
 * 邮件内容
 */
export interface MessageInput {
  from: string
  to: string
  subject: string
  body: string
  bodyType: BodyType
  attachment?: MessageAttachment
}

/**
 * 可直接交给 SMTP 会话发送的邮件
 */
export interface ComposedMessage {
  envelope: { from: string; to: string[] }
  /** RFC 5322 格式的完整邮件 */
  raw: Buffer
  messageId: string
}

/**
 * 构建 multipart/mixed 邮件
 *
 * 根节点下固定一个正文部分，附件（如有）以 application/octet-stream
 * 加 base64 编码附在其后。
 */
export async function composeMessage(input: MessageInput): Promise<ComposedMessage> {
  const root = new MimeNode('multipart/mixed')
  root.setHeader('From', input.from)
  root.setHeader('To', input.to)
  root.setHeader('Subject', input.subject)

  root.createChild(`text/${input.bodyType}`).setContent(input.body)

  if (input.attachment) {
    root
      .createChild('application/octet-stream', { filename: input.attachment.filename })
      .setHeader('Content-Disposition', 'attachment')
      .setContent(input.attachment.content)
  }

  // 信封地址由 nodemailer 从头部解析，"Name <addr>" 形式只保留地址部分
  const { from, to } = root.getEnvelope()
  if (!from) {
    throw new Error(`Invalid sender address: ${input.from}`)
  }
  if (to.length === 0) {
    throw new Error(`Invalid recipient address: ${input.to}`)
  }

  const messageId = root.messageId()

  const raw = await new Promise<Buffer>((resolve, reject) => {
    root.build((err, buf) => {
      if (err) {
        reject(err)
        return
      }
      resolve(buf)
    })
  })

  return {
    envelope: { from, to },
    raw,
    messageId,
  }
}
