import { Hono } from 'hono'
import { cors } from 'hono/cors'
import type { HttpBindings } from '@hono/node-server'
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response'
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import type { AppConfig } from './config.js'
import { errorMessage } from './errors.js'
import { SERVER_NAME, SERVER_VERSION, createMcpServer } from './server.js'
import type { SmtpSessionFactory } from './smtp-session.js'

/**
 * 创建 Streamable HTTP 应用
 *
 * 每个 POST 请求使用独立的 Server 与 Transport（无状态模式），
 * 请求之间不共享任何 SMTP 会话。需由 @hono/node-server 提供服务，
 * MCP 传输直接读写 Node.js 的 IncomingMessage / ServerResponse。
 */
export function createHttpApp(config: AppConfig, sessionFactory?: SmtpSessionFactory) {
  const app = new Hono<{ Bindings: HttpBindings }>()

  // 启用 CORS
  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'mcp-session-id', 'mcp-protocol-version'],
      exposeHeaders: ['mcp-session-id'],
    })
  )

  /**
   * MCP 端点 - 处理 Streamable HTTP 请求
   */
  app.post('/mcp', async (c) => {
    try {
      const server = createMcpServer(config, sessionFactory)
      const { incoming, outgoing } = c.env

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      })

      // 连接关闭时清理资源
      outgoing.on('close', () => {
        Promise.all([transport.close(), server.close()]).catch((error) => {
          console.error('MCP cleanup error:', errorMessage(error))
        })
      })

      await server.connect(transport)

      const body: unknown = await c.req.json()
      await transport.handleRequest(incoming, outgoing, body)

      // 响应已由 transport 写入 outgoing
      return RESPONSE_ALREADY_SENT
    } catch (error) {
      const message = errorMessage(error)
      console.error('MCP request error:', message)

      return c.json(
        {
          jsonrpc: '2.0',
          error: {
            code: -32603,
            message: `Internal error: ${message}`,
          },
          id: null,
        },
        500
      )
    }
  })

  /**
   * 无状态模式下没有会话可关闭
   */
  app.delete('/mcp', (c) => {
    return c.json({ status: 'ok' })
  })

  /**
   * 健康检查端点
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: SERVER_NAME,
      version: SERVER_VERSION,
      timestamp: new Date().toISOString(),
    })
  })

  return app
}
