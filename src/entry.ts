import { z } from 'zod';
import { PayloadError, errorMessage } from './errors.js';

/**
 * Stored entry payload, as written by the indexer into the record's `json` field.
 */
const citationSchema = z.object({
  xml: z.string().nullable().optional(),
  bib: z.object({
    stencil: z.object({
      reference_id: z.string().nullable().optional()
    }).optional()
  }).optional()
});

const headwordSchema = z.object({
  orig: z.string(),
  regs: z.array(z.string()).default([])
});

const senseSchema = z.object({
  sense_number: z.number().int().optional(),
  definition_xml: z.string().nullable().optional(),
  quotes: z.array(citationSchema).default([])
});

const noteSchema = z.object({
  xml: z.string().nullable().optional()
});

const supplementSchema = z.object({
  xml: z.string().nullable().optional(),
  quotes: z.array(citationSchema).default([])
});

const entrySchema = z.object({
  id: z.string(),
  pos: z.string().default(''),
  headwords: z.array(headwordSchema).min(1),
  senses: z.array(senseSchema).default([]),
  notes: z.array(noteSchema).default([]),
  supplements: z.array(supplementSchema).default([])
});

type CitationData = z.infer<typeof citationSchema>;

export class Headword {
  constructor(public readonly orig: string, private readonly regs: readonly string[]) {}

  /** Regularized spellings, most standard first */
  regularizedSpellings(): string[] {
    return [...this.regs];
  }
}

export class Citation {
  public readonly bib: { stencil: { referenceId: string | null } };

  constructor(public readonly xml: string | null, referenceId: string | null) {
    this.bib = { stencil: { referenceId } };
  }
}

export class Sense {
  constructor(
    /** Definition XML fragment; `~` stands for the regularized headword */
    public definitionXml: string | null,
    public readonly senseNumber: number | null,
    public readonly quotes: Citation[]
  ) {}
}

export class Note {
  constructor(public readonly xml: string | null) {}
}

export class Supplement {
  constructor(public readonly xml: string | null, public readonly quotes: Citation[]) {}
}

export class Entry {
  constructor(
    public readonly id: string,
    public readonly pos: string,
    public readonly headwords: Headword[],
    public readonly senses: Sense[],
    public readonly notes: Note[],
    public readonly supplements: Supplement[]
  ) {}

  /** Every quotation across all senses, in sense order */
  allQuotes(): Citation[] {
    return this.senses.flatMap(sense => sense.quotes);
  }
}

function toCitation(data: CitationData): Citation {
  return new Citation(data.xml ?? null, data.bib?.stencil?.reference_id ?? null);
}

/**
 * Build an Entry from its stored JSON text.
 */
export function entryFromJson(json: string): Entry {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new PayloadError(`Entry payload is not JSON: ${errorMessage(err)}`);
  }

  const parsed = entrySchema.safeParse(raw);
  if (!parsed.success) {
    throw new PayloadError(
      'Entry payload does not match the entry schema',
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    );
  }

  const data = parsed.data;
  return new Entry(
    data.id,
    data.pos,
    data.headwords.map(h => new Headword(h.orig, h.regs)),
    data.senses.map(s => new Sense(s.definition_xml ?? null, s.sense_number ?? null, s.quotes.map(toCitation))),
    data.notes.map(n => new Note(n.xml ?? null)),
    data.supplements.map(s => new Supplement(s.xml ?? null, s.quotes.map(toCitation)))
  );
}
