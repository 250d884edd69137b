import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { SmtpClient } from '../smtp-client.js'
import { registerSendTools } from './send.js'

/**
 * 注册所有 MCP 工具
 */
export function registerAllTools(server: McpServer, client: SmtpClient) {
  registerSendTools(server, client)
}
