import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import { PreconditionError } from '../errors.js'
import type { SmtpClient } from '../smtp-client.js'

/**
 * 失败结果文本
 *
 * 前置条件失败（配置缺失、附件不存在等）直接给出原因，其余加上操作前缀。
 */
function failure(prefix: string, error: Error): CallToolResult {
  const text =
    error instanceof PreconditionError ? `Error: ${error.message}` : `${prefix}: ${error.message}`

  return {
    content: [{ type: 'text', text }],
    isError: true,
  }
}

/**
 * 注册邮件发送相关工具
 */
export function registerSendTools(server: McpServer, client: SmtpClient) {
  /**
   * 工具：发送邮件
   */
  server.registerTool(
    'send_email',
    {
      title: 'Send Email',
      description: 'Send an email to a single recipient through the configured SMTP server',
      inputSchema: {
        to_email: z.string().min(1).describe('Recipient email address'),
        subject: z.string().describe('Email subject'),
        body: z.string().describe('Email body content'),
        use_tls: z
          .boolean()
          .optional()
          .describe('Upgrade the connection with STARTTLS before login (default: true)'),
        body_type: z
          .enum(['plain', 'html'])
          .optional()
          .describe("Email body type - 'plain' or 'html' (default: plain)"),
      },
    },
    async ({ to_email, subject, body, use_tls, body_type }) => {
      const result = await client.sendEmail({
        to: to_email,
        subject,
        body,
        useTls: use_tls ?? true,
        bodyType: body_type ?? 'plain',
      })

      if (!result.success) {
        return failure('Error sending email', result.error)
      }

      return {
        content: [
          {
            type: 'text',
            text: `Email sent successfully to ${result.recipient}\n\n**Subject:** ${subject}\n**Message-ID:** ${result.messageId}`,
          },
        ],
      }
    }
  )

  /**
   * 工具：发送带附件的邮件
   */
  server.registerTool(
    'send_email_with_attachment',
    {
      title: 'Send Email With Attachment',
      description:
        'Send a plain text email with one file from the local filesystem attached',
      inputSchema: {
        to_email: z.string().min(1).describe('Recipient email address'),
        subject: z.string().describe('Email subject'),
        body: z.string().describe('Email body content (plain text)'),
        attachment_path: z.string().describe('Path to the file to attach'),
        use_tls: z
          .boolean()
          .optional()
          .describe('Upgrade the connection with STARTTLS before login (default: true)'),
      },
    },
    async ({ to_email, subject, body, attachment_path, use_tls }) => {
      const result = await client.sendEmailWithAttachment({
        to: to_email,
        subject,
        body,
        attachmentPath: attachment_path,
        useTls: use_tls ?? true,
      })

      if (!result.success) {
        return failure('Error sending email with attachment', result.error)
      }

      return {
        content: [
          {
            type: 'text',
            text: `Email with attachment sent successfully to ${result.recipient}\n\n**Subject:** ${subject}\n**Attachment:** ${result.attachment}\n**Message-ID:** ${result.messageId}`,
          },
        ],
      }
    }
  )

  /**
   * 工具：群发邮件
   */
  server.registerTool(
    'send_bulk_emails',
    {
      title: 'Send Bulk Emails',
      description:
        'Send the same plain text email to multiple recipients over a single SMTP session. A failure for one recipient does not stop the others.',
      inputSchema: {
        recipients: z.string().describe('Comma-separated list of email addresses'),
        subject: z.string().describe('Email subject'),
        body: z.string().describe('Email body content (plain text)'),
        use_tls: z
          .boolean()
          .optional()
          .describe('Upgrade the connection with STARTTLS before login (default: true)'),
      },
    },
    async ({ recipients, subject, body, use_tls }) => {
      const result = await client.sendBulkEmails({
        recipients,
        subject,
        body,
        useTls: use_tls ?? true,
      })

      if (!result.success) {
        return failure('Error sending bulk emails', result.error)
      }

      const { successful, failed } = result
      let text = `Successfully sent to ${successful.length} recipients.`
      if (failed.length > 0) {
        const details = failed.map((f) => `${f.recipient}: ${f.error}`).join(', ')
        text += `\nFailed for ${failed.length} recipients: ${details}`
      }

      return {
        content: [{ type: 'text', text }],
        // 只有全部失败才视为错误，部分成功仍是正常结果
        isError: successful.length === 0,
      }
    }
  )
}
