/**
 * 发送失败的错误类型
 *
 * 工具层会捕获全部错误并转换为文本结果，这些类型只用于区分失败原因。
 */

/**
 * 发起连接之前即可判定的失败
 */
export abstract class PreconditionError extends Error {}

/**
 * 缺少必需的 SMTP 配置
 */
export class ConfigurationError extends PreconditionError {
  /** 缺失的环境变量名 */
  readonly missing: string[]

  constructor(missing: string[]) {
    super(`Missing required email configuration: ${missing.join(', ')}`)
    this.name = 'ConfigurationError'
    this.missing = missing
  }
}

/**
 * 附件路径不存在
 */
export class AttachmentNotFoundError extends PreconditionError {
  readonly path: string

  constructor(path: string) {
    super(`Attachment file not found: ${path}`)
    this.name = 'AttachmentNotFoundError'
    this.path = path
  }
}

/**
 * 群发时收件人列表为空
 */
export class NoRecipientsError extends PreconditionError {
  constructor() {
    super('No recipients provided')
    this.name = 'NoRecipientsError'
  }
}

/**
 * SMTP 会话阶段
 */
export type SmtpStage = 'connect' | 'starttls' | 'auth' | 'send'

/**
 * SMTP 事务失败（连接、TLS 升级、认证或发送）
 */
export class SmtpTransactionError extends Error {
  readonly stage: SmtpStage

  constructor(stage: SmtpStage, cause: unknown) {
    super(errorMessage(cause), { cause })
    this.name = 'SmtpTransactionError'
    this.stage = stage
  }
}

/**
 * 将任意抛出值规范为 Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * 提取错误描述
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
