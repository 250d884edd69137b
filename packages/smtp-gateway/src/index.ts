/**
 * SMTP Gateway MCP Server
 *
 * 通过 MCP 提供 SMTP 发信能力：
 * - 单封发送（纯文本或 HTML）
 * - 带附件发送
 * - 单会话群发
 */

// 配置
export {
  loadConfigFromEnv,
  resolveSmtpSettings,
  type AppConfig,
  type SmtpSettings,
} from './core/config.js'

// 错误类型
export {
  PreconditionError,
  ConfigurationError,
  AttachmentNotFoundError,
  NoRecipientsError,
  SmtpTransactionError,
  type SmtpStage,
} from './core/errors.js'

// Server
export { createMcpServer } from './core/server.js'
export { createHttpApp } from './core/http-app.js'

// 客户端（可单独使用）
export {
  SmtpClient,
  parseRecipients,
  type SendEmailOptions,
  type SendAttachmentOptions,
  type SendBulkOptions,
  type SendResult,
  type BulkSendResult,
  type BulkFailure,
} from './core/smtp-client.js'
export {
  NodemailerSmtpSession,
  createNodemailerSession,
  withSmtpSession,
  type SmtpSession,
  type SmtpSessionFactory,
  type SmtpSessionOptions,
  type SmtpCredentials,
} from './core/smtp-session.js'
export { composeMessage, type BodyType, type ComposedMessage, type MessageInput } from './core/message.js'
