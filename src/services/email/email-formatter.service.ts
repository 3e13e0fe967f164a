import type { GraphMessage, GraphRecipient } from '../../types/mail.types';

export function stripHtml(html: string | undefined): string {
  return html ? html.replace(/<[^>]*>/g, '') : '';
}

/**
 * "Name (address)", or the bare address when there is no display name
 */
export function formatAddress(recipient: GraphRecipient | null | undefined): string {
  if (!recipient) return 'Unknown';
  const name = recipient.emailAddress?.name ?? '';
  const address = recipient.emailAddress?.address ?? '';
  return name ? `${name} (${address})` : address;
}

export function formatRecipients(recipients: GraphRecipient[] | undefined): string {
  if (!recipients || recipients.length === 0) return 'None';
  return recipients.map(formatAddress).join(', ');
}

// 2026-03-01T09:15:00Z -> 2026-03-01 09:15:00
export function formatDate(iso: string | undefined): string {
  return (iso ?? '').slice(0, 19).replace('T', ' ');
}

export function formatList(emails: GraphMessage[], heading: string): string {
  const lines = [`${heading}\n`];

  emails.forEach((email, index) => {
    const unread = email.isRead ? '' : '[UNREAD] ';
    lines.push(`${index + 1}. ${unread}${formatDate(email.receivedDateTime)} - From: ${formatAddress(email.from)}`);
    lines.push(`   Subject: ${email.subject || '(no subject)'}`);
    lines.push(`   ID: ${email.id}\n`);
  });

  return lines.join('\n');
}

export function formatDetail(email: GraphMessage): string {
  const cc = formatRecipients(email.ccRecipients);
  const bcc = formatRecipients(email.bccRecipients);

  const body =
    email.body?.contentType === 'html'
      ? stripHtml(email.body.content)
      : email.body?.content ?? email.bodyPreview ?? '';

  const lines = [`From: ${formatAddress(email.from)}`, `To: ${formatRecipients(email.toRecipients)}`];
  if (cc !== 'None') lines.push(`CC: ${cc}`);
  if (bcc !== 'None') lines.push(`BCC: ${bcc}`);
  lines.push(
    `Subject: ${email.subject || '(no subject)'}`,
    `Date: ${formatDate(email.receivedDateTime)}`,
    `Importance: ${email.importance ?? 'normal'}`,
    `Has Attachments: ${email.hasAttachments ? 'Yes' : 'No'}`,
    '',
    body
  );

  return lines.join('\n');
}
