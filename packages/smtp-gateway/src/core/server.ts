import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { AppConfig } from './config.js'
import { SmtpClient } from './smtp-client.js'
import type { SmtpSessionFactory } from './smtp-session.js'
import { registerAllTools } from './tools/index.js'

export const SERVER_NAME = 'smtp-gateway'
export const SERVER_VERSION = '0.1.0'

/**
 * 创建 MCP Server 实例
 *
 * @param config - 应用配置
 * @param sessionFactory - SMTP 会话工厂，默认使用 nodemailer
 * @returns 配置好的 MCP Server
 */
export function createMcpServer(
  config: AppConfig,
  sessionFactory?: SmtpSessionFactory
): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  })

  // 注册邮件发送工具
  registerAllTools(server, new SmtpClient(config, sessionFactory))

  return server
}
