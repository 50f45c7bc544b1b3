/**
 * Console formatting for CLI output
 */

import { GeneratedEmail, ScoredTechnology } from '../engine/types';
import { personaLabel } from '../engine/generator';

export function formatTechnologyTable(scored: readonly ScoredTechnology[]): string {
  if (scored.length === 0) {
    return '  (no technologies detected)';
  }
  return scored
    .map((tech) => {
      const ids = tech.accountIds.length > 0 ? ` ids=${tech.accountIds.join(';')}` : '';
      return `  #${tech.rank} ${tech.signature.name} [${tech.signature.category}] score=${tech.score}${ids}\n` +
        `     ${tech.matchedSignals.join(', ')}`;
    })
    .join('\n');
}

export function formatEmail(email: GeneratedEmail): string {
  const from = personaLabel({ name: email.personaName, role: email.personaRole });
  return [
    `From: ${from} <${email.personaEmail}>`,
    `Subject: ${email.subject}`,
    `Variant: ${email.variantId}`,
    '',
    email.body,
  ].join('\n');
}
