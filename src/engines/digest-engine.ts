import { EMAIL_DIGESTS, MATCHED_GRANTS } from '../lib/artifacts.js';
import { buildDigests } from '../lib/digest-builder.js';
import { writeArtifact } from '../providers/stage-files.js';
import type { DigestRenderer } from '../types/collaborators.js';
import { MatchOutputSchema } from '../types/digest.js';
import { readStageInput } from './stage-input.js';
import type { StageContext, StageEngine, StageOutcome } from './types.js';

export interface DigestResult extends StageOutcome {
  totalRecipients: number;
  totalGrants: number;
}

export class DigestEngine implements StageEngine<DigestResult> {
  readonly stage = 'build-digest';

  constructor(private readonly renderer: DigestRenderer) {}

  async run(context: StageContext): Promise<DigestResult> {
    const input = await readStageInput(context, 'match-keywords', MATCHED_GRANTS, MatchOutputSchema);
    const now = context.now();

    const document = buildDigests(input.data, {
      processingDate: context.processingDate,
      sourceFile: input.path,
      renderer: this.renderer,
      builtAt: now.toISOString()
    });
    const path = await writeArtifact(context.stageDir, EMAIL_DIGESTS.filename(now), document);

    return {
      outputs: [path],
      totalRecipients: document.totalRecipients,
      totalGrants: document.totalGrants,
      summary: `${document.totalRecipients} digests, ${document.totalGrants} grants`
    };
  }
}
