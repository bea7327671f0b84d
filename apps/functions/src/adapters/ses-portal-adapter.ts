import { SESClient, SendEmailCommand } from '@aws-sdk/client-ses';
import { SubmissionError } from '@/helpers/errors';
import type { PortalReceipt, PortalSubmission, PortalSubmissionAdapter } from '@/types/collaborators';

export type SesPortalConfig = {
  from: string;
  to: string;
  client?: SESClient;
};

export const renderSubmissionEmail = ({ portalId, opportunity, documents }: PortalSubmission) => ({
  subject: `[${portalId}] Bid submission: ${opportunity.title} (${opportunity.sourceId})`,
  body: [
    `Solicitation: ${opportunity.sourceId}`,
    `Title: ${opportunity.title}`,
    `Agency: ${opportunity.agency ?? 'N/A'}`,
    `Due: ${opportunity.dueDate}`,
    ...(opportunity.url ? [`Link: ${opportunity.url}`] : []),
    '',
    ...documents.flatMap((doc) => [`===== ${doc.name} =====`, doc.content]),
  ].join('\n'),
});

/**
 * Submits by emailing the rendered application to the contracting office
 * mailbox. The SES message id is the confirmation id.
 */
export class SesPortalAdapter implements PortalSubmissionAdapter {
  private readonly client: SESClient;

  constructor(private readonly cfg: SesPortalConfig) {
    this.client = cfg.client ?? new SESClient({});
  }

  async submit(submission: PortalSubmission): Promise<PortalReceipt> {
    const { subject, body } = renderSubmissionEmail(submission);

    let messageId: string | undefined;
    try {
      const res = await this.client.send(
        new SendEmailCommand({
          Source: this.cfg.from,
          Destination: { ToAddresses: [this.cfg.to] },
          Message: {
            Subject: { Data: subject, Charset: 'UTF-8' },
            Body: { Text: { Data: body, Charset: 'UTF-8' } },
          },
        }),
      );
      messageId = res.MessageId;
    } catch (err) {
      const name = err instanceof Error ? err.name : 'Error';
      throw new SubmissionError(`${name}: ${err instanceof Error ? err.message : String(err)}`, name, { cause: err });
    }

    if (!messageId) throw new SubmissionError('SES returned no message id', 'NoMessageId');
    return { status: 'sent', confirmationId: messageId };
  }
}
