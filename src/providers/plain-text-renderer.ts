import type { DigestRenderContext, DigestRenderer, RenderedDigest } from '../types/collaborators.js';
import type { DigestGrant } from '../types/digest.js';

const STATUS_MARK: Record<DigestGrant['deadlineStatus'], string> = {
  missing: '?',
  past: 'x',
  critical: '!!',
  warning: '!',
  ok: '-'
};

function renderGrant(grant: DigestGrant, position: number): string[] {
  const lines = [`${position}. ${grant.title ?? grant.url}`];
  if (grant.organization) lines.push(`   Organization: ${grant.organization}`);
  lines.push(`   Deadline: ${grant.parsedDeadline ?? grant.deadline ?? 'n/a'} [${STATUS_MARK[grant.deadlineStatus]}] ${grant.deadlineLabel}`);
  if (grant.fundingAmount) lines.push(`   Funding: ${grant.fundingAmount}`);
  if (grant.matchedKeywords.length > 0) lines.push(`   Keywords: ${grant.matchedKeywords.join(', ')}`);
  lines.push(`   ${grant.url}`);
  return lines;
}

/**
 * Plain-text digest body. No HTML part.
 */
export class PlainTextDigestRenderer implements DigestRenderer {
  render(context: DigestRenderContext): RenderedDigest {
    const count = context.grants.length;
    const subject = `Grant digest ${context.processingDate}: ${count} new ${count === 1 ? 'opportunity' : 'opportunities'}`;

    const lines = [
      `Hello ${context.displayName},`,
      '',
      `${count} grant ${count === 1 ? 'opportunity matches' : 'opportunities match'} your keywords: ${context.keywords.join(', ')}`,
      ''
    ];
    context.grants.forEach((grant, index) => {
      lines.push(...renderGrant(grant, index + 1), '');
    });

    return { subject, text: lines.join('\n').trimEnd() + '\n', html: null };
  }
}
