import { afterEach, describe, it, expect } from 'vitest'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js'
import { RecordingSessionFactory } from '../../mocks/index.js'
import { loadConfigFromEnv, type AppConfig } from '../config.js'
import { createMcpServer } from '../server.js'

const config = loadConfigFromEnv({
  EMAIL_FROM: 'sender@example.com',
  SMTP_SERVER: 'smtp.example.com',
  SMTP_PORT: '587',
  SMTP_USERNAME: 'sender',
  SMTP_PASSWORD: 'test-password',
})

const openClients: Client[] = []

async function connect(appConfig: AppConfig, factory: RecordingSessionFactory): Promise<Client> {
  const server = createMcpServer(appConfig, factory.create)
  const client = new Client({ name: 'test-client', version: '1.0.0' })
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)])
  openClients.push(client)
  return client
}

async function callText(client: Client, name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }))
  const [first] = result.content
  if (!first || first.type !== 'text') {
    throw new Error(`Tool ${name} did not return text`)
  }
  return { text: first.text, isError: result.isError ?? false }
}

afterEach(async () => {
  await Promise.all(openClients.splice(0).map((c) => c.close()))
})

describe('send tools', () => {
  it('registers the three send tools', async () => {
    const client = await connect(config, new RecordingSessionFactory())

    const { tools } = await client.listTools()

    expect(tools.map((t) => t.name).sort()).toEqual([
      'send_bulk_emails',
      'send_email',
      'send_email_with_attachment',
    ])
  })

  it('send_email reports the recipient', async () => {
    const factory = new RecordingSessionFactory()
    const client = await connect(config, factory)

    const { text, isError } = await callText(client, 'send_email', {
      to_email: 'a@x.com',
      subject: 'Hi',
      body: 'Hello',
    })

    const messageId = factory.sessions[0]?.messages[0]?.messageId
    expect(isError).toBe(false)
    expect(text).toBe(`Email sent successfully to a@x.com\n\n**Subject:** Hi\n**Message-ID:** ${messageId}`)
  })

  it('send_email passes use_tls and body_type through', async () => {
    const factory = new RecordingSessionFactory()
    const client = await connect(config, factory)

    await callText(client, 'send_email', {
      to_email: 'a@x.com',
      subject: 'Hi',
      body: '<p>Hello</p>',
      use_tls: false,
      body_type: 'html',
    })

    expect(factory.events).toEqual(['connect', 'login', 'send:a@x.com', 'close'])
    expect(factory.sessions[0]?.messages[0]?.raw.toString()).toMatch(/^Content-Type: text\/html/m)
  })

  it('send_email describes a transaction failure', async () => {
    const factory = new RecordingSessionFactory({ connectError: new Error('connect ECONNREFUSED') })
    const client = await connect(config, factory)

    const result = await callText(client, 'send_email', {
      to_email: 'a@x.com',
      subject: 'Hi',
      body: 'Hello',
    })

    expect(result).toEqual({ text: 'Error sending email: connect ECONNREFUSED', isError: true })
  })

  it('every tool reports missing configuration without connecting', async () => {
    const factory = new RecordingSessionFactory()
    const client = await connect(loadConfigFromEnv({}), factory)
    const expected = {
      text: 'Error: Missing required email configuration: EMAIL_FROM, SMTP_SERVER, SMTP_PORT, SMTP_USERNAME, SMTP_PASSWORD',
      isError: true,
    }

    expect(
      await callText(client, 'send_email', { to_email: 'a@x.com', subject: 'Hi', body: 'Hello' })
    ).toEqual(expected)
    expect(
      await callText(client, 'send_email_with_attachment', {
        to_email: 'a@x.com',
        subject: 'Hi',
        body: 'Hello',
        attachment_path: '/tmp/report.pdf',
      })
    ).toEqual(expected)
    expect(
      await callText(client, 'send_bulk_emails', { recipients: 'a@x.com', subject: 'Hi', body: 'Hello' })
    ).toEqual(expected)
    expect(factory.connectAttempts).toBe(0)
  })

  it('send_email_with_attachment reports a missing file', async () => {
    const factory = new RecordingSessionFactory()
    const client = await connect(config, factory)

    const result = await callText(client, 'send_email_with_attachment', {
      to_email: 'a@x.com',
      subject: 'Hi',
      body: 'Hello',
      attachment_path: '/nonexistent/smtp-gateway/report.pdf',
    })

    expect(result).toEqual({
      text: 'Error: Attachment file not found: /nonexistent/smtp-gateway/report.pdf',
      isError: true,
    })
    expect(factory.connectAttempts).toBe(0)
  })

  it('send_bulk_emails summarizes a partial failure', async () => {
    const factory = new RecordingSessionFactory({ rejectedRecipients: ['b@x.com'] })
    const client = await connect(config, factory)

    const result = await callText(client, 'send_bulk_emails', {
      recipients: 'a@x.com, b@x.com ,c@x.com',
      subject: 'News',
      body: 'Hello all',
    })

    expect(result).toEqual({
      text: 'Successfully sent to 2 recipients.\nFailed for 1 recipients: b@x.com: 550 5.1.1 Mailbox unavailable',
      isError: false,
    })
    expect(factory.events.filter((e) => e === 'close')).toHaveLength(1)
  })

  it('send_bulk_emails reports full success on one line', async () => {
    const client = await connect(config, new RecordingSessionFactory())

    const result = await callText(client, 'send_bulk_emails', {
      recipients: 'a@x.com,b@x.com',
      subject: 'News',
      body: 'Hello all',
    })

    expect(result).toEqual({ text: 'Successfully sent to 2 recipients.', isError: false })
  })

  it('send_bulk_emails flags an error when every recipient fails', async () => {
    const factory = new RecordingSessionFactory({
      rejectedRecipients: ['a@x.com', 'b@x.com'],
      rejectionMessage: '554 Relay denied',
    })
    const client = await connect(config, factory)

    const result = await callText(client, 'send_bulk_emails', {
      recipients: 'a@x.com,b@x.com',
      subject: 'News',
      body: 'Hello all',
    })

    expect(result).toEqual({
      text: 'Successfully sent to 0 recipients.\nFailed for 2 recipients: a@x.com: 554 Relay denied, b@x.com: 554 Relay denied',
      isError: true,
    })
  })

  it('send_bulk_emails returns a single error when login fails', async () => {
    const factory = new RecordingSessionFactory({ authError: new Error('535 Authentication failed') })
    const client = await connect(config, factory)

    const result = await callText(client, 'send_bulk_emails', {
      recipients: 'a@x.com,b@x.com',
      subject: 'News',
      body: 'Hello all',
    })

    expect(result).toEqual({
      text: 'Error sending bulk emails: 535 Authentication failed',
      isError: true,
    })
    expect(factory.events.some((e) => e.startsWith('send:'))).toBe(false)
  })
})
