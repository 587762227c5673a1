import type { AnalysisContent, DocumentMetadata } from '@legisight/model';
import type { z } from 'zod';

import {
  ANALYSIS_SCHEMA_NAME,
  INSUFFICIENT_TEXT_FOR_ANALYSIS,
  getAnalysisSchema,
} from '../schemas/structured-analysis-schema';

/**
 * Everything a structured-generation call needs
 */
export interface PromptBundle {
  systemPrompt: string;

  /**
   * User prompt; for the vision path this accompanies the attached PDF
   */
  userPrompt: string;

  schema: z.ZodType<AnalysisContent>;
  schemaName: string;
  schemaVersion: string;
}

/**
 * Position of a chunk within its document
 */
export interface ChunkPosition {
  /**
   * 0-based chunk index
   */
  index: number;
  total: number;

  /**
   * Whether the document was split along section headings
   */
  hasStructure: boolean;
}

/**
 * PromptBuilder - builds prompts and the target schema for analysis calls
 *
 * Pure: the same arguments always yield the same bundle.
 */
export class PromptBuilder {
  /**
   * Prompt for analyzing a whole document in one call
   */
  static forDocument(
    text: string,
    metadata: DocumentMetadata,
    schemaVersion: string,
  ): PromptBundle {
    return this.bundle(
      this.buildSystemPrompt(metadata, false),
      [
        'Analyze the following legislative text and provide a comprehensive analysis. ' +
          'Focus on identifying key provisions, potential impacts (especially on public health, ' +
          'local government, and the economy), affected stakeholders, and implementation considerations.',
        this.buildContext(metadata),
        `LEGISLATIVE TEXT:\n\`\`\`\n${text}\n\`\`\``,
      ],
      schemaVersion,
    );
  }

  /**
   * Prompt for analyzing one chunk, stating its position in the document
   */
  static forChunk(
    text: string,
    metadata: DocumentMetadata,
    schemaVersion: string,
    position: ChunkPosition,
  ): PromptBundle {
    if (
      !Number.isInteger(position.index) ||
      position.index < 0 ||
      position.index >= position.total
    ) {
      throw new RangeError(
        `Chunk index ${position.index} is outside 0..${position.total - 1}`,
      );
    }

    return this.bundle(
      this.buildSystemPrompt(metadata, true),
      [
        this.buildPositionInstructions(position),
        this.buildContext(metadata),
        `CURRENT SECTION TEXT TO ANALYZE:\n${text}`,
      ],
      schemaVersion,
    );
  }

  /**
   * Prompt accompanying a PDF attachment on the vision path
   */
  static forVision(
    metadata: DocumentMetadata,
    schemaVersion: string,
  ): PromptBundle {
    return this.bundle(
      this.buildSystemPrompt(metadata, false),
      [
        'The attached PDF contains the legislative text. Read the whole document, ' +
          'including any scanned pages, and provide a comprehensive analysis.',
        this.buildContext(metadata),
      ],
      schemaVersion,
    );
  }

  private static bundle(
    systemPrompt: string,
    sections: Array<string | undefined>,
    schemaVersion: string,
  ): PromptBundle {
    return {
      systemPrompt,
      userPrompt: sections.filter((section) => section !== undefined).join('\n\n'),
      schema: getAnalysisSchema(schemaVersion),
      schemaName: ANALYSIS_SCHEMA_NAME,
      schemaVersion,
    };
  }

  static buildSystemPrompt(
    metadata: DocumentMetadata,
    isChunk: boolean,
  ): string {
    const focus = metadata.jurisdiction
      ? `public health agencies and local governments in the ${metadata.jurisdiction} jurisdiction`
      : 'public health agencies and local governments';
    const base =
      'You are a legislative analysis assistant specializing in public health and local government impacts. ' +
      'Provide a comprehensive, objective analysis of the bill text following the structured format exactly. ' +
      `Focus especially on impacts to ${focus}. ` +
      'If information is insufficient for any field, provide reasonable, conservative assessments. ' +
      'If the bill text is too short or lacks substantive content to perform meaningful analysis, ' +
      `return '${INSUFFICIENT_TEXT_FOR_ANALYSIS}' in the summary field and populate minimal required fields. ` +
      'Use only facts present in the text - do not add external information or assumptions.';

    return isChunk
      ? `${base} You are analyzing a portion of a larger document, so focus on extracting key information ` +
          'from this specific section while considering how it fits into the broader bill.'
      : base;
  }

  static buildPositionInstructions(position: ChunkPosition): string {
    const part = position.index + 1;
    let instructions: string;

    if (position.index === 0) {
      instructions =
        `You are analyzing PART 1 OF ${position.total} of a large legislative bill. ` +
        "Focus on the sections provided while considering the bill's overall context.";
    } else if (position.index === position.total - 1) {
      instructions =
        `You are analyzing THE FINAL PART (${part} OF ${position.total}) of a large legislative bill. ` +
        'Other parts are analyzed separately; do not assume earlier provisions are absent.';
    } else {
      instructions =
        `You are analyzing PART ${part} OF ${position.total} of a large legislative bill. ` +
        'Focus on the new content in this section; other parts are analyzed separately.';
    }

    instructions += position.hasStructure
      ? ' This document has structured sections. Pay attention to section headers and how they relate to the rest of the bill.'
      : ' This document was split by content size rather than by natural sections. Be aware that some concepts might span across chunks.';

    return instructions;
  }

  /**
   * Document context block, or undefined when no descriptive metadata is set
   */
  static buildContext(metadata: DocumentMetadata): string | undefined {
    const lines = [
      ['Bill Number', metadata.identifier],
      ['Title', metadata.title],
      ['Description', metadata.description],
      ['Jurisdiction', metadata.jurisdiction],
      ['Source', metadata.source],
      ['Status', metadata.status],
    ]
      .filter((entry): entry is [string, string] => Boolean(entry[1]))
      .map(([label, value]) => `${label}: ${value}`);

    return lines.length > 0 ? `BILL CONTEXT:\n${lines.join('\n')}` : undefined;
  }
}
