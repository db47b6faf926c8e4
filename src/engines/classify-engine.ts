import { CLASSIFIED_LINKS, DEDUPLICATED_LINKS } from '../lib/artifacts.js';
import { writeArtifact } from '../providers/stage-files.js';
import type { LinkClassifier } from '../types/collaborators.js';
import { DeduplicatedLinksSchema, type ClassifiedLink, type ClassifiedLinks } from '../types/grant.js';
import { logger } from '../utils/logger.js';
import { readStageInput } from './stage-input.js';
import type { StageContext, StageEngine, StageOutcome } from './types.js';

const log = logger.createContext('classify-engine');

export interface ClassifyResult extends StageOutcome {
  totalLinks: number;
  relevantLinks: number;
}

export class ClassifyEngine implements StageEngine<ClassifyResult> {
  readonly stage = 'classify';

  constructor(private readonly classifier: LinkClassifier) {}

  async run(context: StageContext): Promise<ClassifyResult> {
    const input = await readStageInput(context, 'deduplicate', DEDUPLICATED_LINKS, DeduplicatedLinksSchema);
    const links = input.data.links;

    log.verbose(`Classifying ${links.length} links with ${this.classifier.name}`);
    const classified = links.length > 0 ? await this.classifier.classify(links) : [];

    // Whatever the classifier returns, only links from the input are kept
    const known = new Set(links.map(link => link.url));
    const relevant: ClassifiedLink[] = classified.filter(link => link.relevant && known.has(link.url));

    const output: ClassifiedLinks = {
      processingDate: context.processingDate,
      totalLinks: links.length,
      relevantLinks: relevant.length,
      links: relevant
    };
    const path = await writeArtifact(context.stageDir, CLASSIFIED_LINKS.filename(context.now()), output);

    return {
      outputs: [path],
      totalLinks: links.length,
      relevantLinks: relevant.length,
      summary: `${relevant.length} of ${links.length} links classified as grants`
    };
  }
}
