import { describe, test, expect } from 'vitest';
import { SmtpTransport, type Mailer } from '../smtp-transport.js';

type Mail = Parameters<Mailer['sendMail']>[0];

class FakeMailer implements Mailer {
  readonly mails: Mail[] = [];

  constructor(private readonly reply: { accepted?: unknown[]; rejected?: unknown[] } = {}) {}

  async sendMail(mail: Mail) {
    this.mails.push(mail);
    return { messageId: '<1@smtp.example.org>', ...this.reply };
  }
}

const smtp = { host: 'smtp.example.org', port: 587, secure: false, user: 'bot@example.org', pass: 'test-secret' };

describe('SmtpTransport', () => {
  test('should send from the configured address and return the message id', async () => {
    const mailer = new FakeMailer({ accepted: ['a@x.com'], rejected: [] });
    const transport = new SmtpTransport({ smtp, from: 'digest@example.org', transporter: mailer });

    const receipt = await transport.send({ to: 'a@x.com', subject: 'Hello', text: 'body', html: null });

    expect(receipt).toEqual({ messageId: '<1@smtp.example.org>' });
    expect(mailer.mails).toEqual([
      { from: 'digest@example.org', to: 'a@x.com', subject: 'Hello', text: 'body', html: undefined }
    ]);
  });

  test('should fail when every recipient is rejected', async () => {
    const mailer = new FakeMailer({ accepted: [], rejected: ['a@x.com'] });
    const transport = new SmtpTransport({ smtp, from: 'digest@example.org', transporter: mailer });

    await expect(transport.send({ to: 'a@x.com', subject: 'Hello', text: 'body' })).rejects.toThrow(
      'SMTP server rejected recipient(s): a@x.com'
    );
  });

  test('should accept a partial delivery', async () => {
    const mailer = new FakeMailer({ accepted: ['a@x.com'], rejected: ['b@x.com'] });
    const transport = new SmtpTransport({ smtp, from: 'digest@example.org', transporter: mailer });

    await expect(transport.send({ to: 'a@x.com, b@x.com', subject: 'Hello', text: 'body' })).resolves.toEqual({
      messageId: '<1@smtp.example.org>'
    });
  });

  test('should propagate transport errors', async () => {
    const transport = new SmtpTransport({
      smtp,
      from: 'digest@example.org',
      transporter: {
        sendMail: async () => {
          throw new Error('connect ECONNREFUSED');
        }
      }
    });

    await expect(transport.send({ to: 'a@x.com', subject: 'Hello', text: 'body' })).rejects.toThrow(
      'connect ECONNREFUSED'
    );
  });
});
