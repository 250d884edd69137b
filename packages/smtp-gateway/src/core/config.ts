import 'dotenv/config'
import { z } from 'zod'
import { ConfigurationError } from './errors.js'

/**
 * 空字符串视为未设置
 */
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalString = z.preprocess(blankToUndefined, z.string().trim().min(1).optional())

const portNumber = z.coerce.number().int().min(1).max(65535)

/**
 * 应用配置 Schema
 *
 * SMTP 相关字段在启动时允许缺失，发送时再由 resolveSmtpSettings 校验，
 * 这样缺少凭据的进程仍可启动，并在每次调用工具时返回可读的错误。
 */
export const AppConfigSchema = z.object({
  /** 发件人地址 */
  EMAIL_FROM: optionalString,
  /** SMTP 服务器地址 */
  SMTP_SERVER: optionalString,
  /** SMTP 端口 */
  SMTP_PORT: z.preprocess(blankToUndefined, portNumber.optional()),
  /** SMTP 登录用户名 */
  SMTP_USERNAME: optionalString,
  /** SMTP 密码或授权码 */
  SMTP_PASSWORD: optionalString,
  /** SMTP 连接、问候及 socket 超时（毫秒） */
  SMTP_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(30000)),
  /** HTTP 传输监听地址 */
  MCP_HOST: z.preprocess(blankToUndefined, z.string().default('0.0.0.0')),
  /** HTTP 传输监听端口 */
  MCP_PORT: z.preprocess(blankToUndefined, portNumber.default(8085)),
})

export type AppConfig = z.infer<typeof AppConfigSchema>

/**
 * 发送时使用的 SMTP 配置（所有字段均已就绪）
 */
export interface SmtpSettings {
  from: string
  host: string
  port: number
  username: string
  password: string
  timeoutMs: number
}

/**
 * 从环境变量加载配置
 *
 * 格式错误的值（例如 SMTP_PORT=abc）会直接抛出，缺失的 SMTP 字段不会。
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const result = AppConfigSchema.safeParse(env)

  if (!result.success) {
    const messages = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join(', ')
    throw new Error(`Invalid configuration: ${messages}`)
  }

  return result.data
}

/**
 * 校验并提取 SMTP 配置
 *
 * @throws ConfigurationError 任一必需字段缺失时
 */
export function resolveSmtpSettings(config: AppConfig): SmtpSettings {
  const { EMAIL_FROM, SMTP_SERVER, SMTP_PORT, SMTP_USERNAME, SMTP_PASSWORD } = config

  if (
    EMAIL_FROM === undefined ||
    SMTP_SERVER === undefined ||
    SMTP_PORT === undefined ||
    SMTP_USERNAME === undefined ||
    SMTP_PASSWORD === undefined
  ) {
    const missing = Object.entries({
      EMAIL_FROM,
      SMTP_SERVER,
      SMTP_PORT,
      SMTP_USERNAME,
      SMTP_PASSWORD,
    })
      .filter(([, value]) => value === undefined)
      .map(([name]) => name)
    throw new ConfigurationError(missing)
  }

  return {
    from: EMAIL_FROM,
    host: SMTP_SERVER,
    port: SMTP_PORT,
    username: SMTP_USERNAME,
    password: SMTP_PASSWORD,
    timeoutMs: config.SMTP_TIMEOUT_MS,
  }
}
