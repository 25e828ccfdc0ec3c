import type { ElicitationContext } from './types.js';

const PREVIEW_LIMIT = 300;

const INTENT_LABEL = {
  send: 'Email',
  forward: 'Forwarded email',
  reply: 'Reply',
} as const;

function formatTimeout(timeoutMs: number): string {
  const seconds = Math.round(timeoutMs / 1000);
  return seconds >= 120 && seconds % 60 === 0 ? `${seconds / 60} minutes` : `${seconds} seconds`;
}

export function bodyPreview(text: string | undefined): string {
  const body = (text ?? '').trim();
  if (!body) return '(empty)';
  return body.length > PREVIEW_LIMIT ? `${body.slice(0, PREVIEW_LIMIT)}... [truncated]` : body;
}

/** Prompt shown to the interactive caller before a send to untrusted recipients. */
export function buildConfirmationMessage(context: ElicitationContext, timeoutMs: number): string {
  const { content, decision, intent } = context;
  const lines = [
    `${INTENT_LABEL[intent]} confirmation required`,
    '',
    'Recipients:',
    `  To: ${content.to.join(', ')}`,
  ];
  if (content.cc?.length) lines.push(`  Cc: ${content.cc.join(', ')}`);
  if (content.bcc?.length) lines.push(`  Bcc: ${content.bcc.join(', ')}`);
  lines.push(
    '',
    `Subject: ${content.subject}`,
    '',
    'Body preview:',
    bodyPreview(content.text),
    '',
    `Not on your trust list: ${decision.untrustedRecipients.join(', ')}`,
    '',
    'Choose an action: send anyway, save as draft, or cancel.',
    `No answer within ${formatTimeout(timeoutMs)} cancels the request.`,
  );
  return lines.join('\n');
}
