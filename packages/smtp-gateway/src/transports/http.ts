#!/usr/bin/env node
/**
 * Streamable HTTP 传输入口
 *
 * 默认监听 0.0.0.0:8085，MCP 端点为 /mcp。
 * 可通过 MCP_HOST / MCP_PORT 修改。
 */
import { serve } from '@hono/node-server'
import { loadConfigFromEnv, resolveSmtpSettings } from '../core/config.js'
import { errorMessage } from '../core/errors.js'
import { createHttpApp } from '../core/http-app.js'

async function main() {
  // 加载配置
  const config = loadConfigFromEnv()

  // 配置不完整时仍然启动，发送工具会返回错误
  try {
    resolveSmtpSettings(config)
  } catch (error) {
    console.error(`Warning: ${errorMessage(error)}`)
  }

  const app = createHttpApp(config)

  serve(
    {
      fetch: app.fetch,
      hostname: config.MCP_HOST,
      port: config.MCP_PORT,
    },
    (info) => {
      console.error(`SMTP gateway MCP server listening on http://${info.address}:${info.port}/mcp`)
    }
  )
}

main().catch((error) => {
  console.error('MCP Server failed to start:', error)
  process.exit(1)
})
