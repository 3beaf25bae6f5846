import { errorMessage } from './errors.js';
import type { EntryPresenter } from './presenter.js';

export interface RenderedQuote {
  html: string | null;
}

export interface RenderedSense {
  senseNumber: number | null;
  html: string | null;
  quotes: RenderedQuote[];
}

export interface RenderedSupplement {
  html: string | null;
  quotes: RenderedQuote[];
}

/**
 * Everything the results page shows for one hit
 */
export interface RenderedHit {
  id: string;
  documentId: string | null;
  heading: string;
  officialHeadword: string | null;
  otherSpellings: string[];
  partOfSpeech: string;
  quoteCount: number;
  form: string | null;
  etym: string | null;
  senses: RenderedSense[];
  notes: (string | null)[];
  supplements: RenderedSupplement[];
  /** One "<section>: <message>" line per section that failed to render */
  errors: string[];
}

/**
 * Render all sections of a hit. A section that throws is shown as null and
 * reported in `errors`; the other sections still render.
 */
export async function renderHit(presenter: EntryPresenter): Promise<RenderedHit> {
  const errors: string[] = [];
  const entryId = presenter.entry.id;

  const section = async (label: string, render: () => Promise<string | null>): Promise<string | null> => {
    try {
      return await render();
    } catch (err) {
      const message = `${label}: ${errorMessage(err)}`;
      console.warn(`[render] ${entryId} ${message}`);
      errors.push(message);
      return null;
    }
  };

  // senses() fills in the headword placeholder, so it runs before any definition render
  const senses = presenter.senses();

  const form = await section('form', () => presenter.formHtml());
  const etym = await section('etym', () => presenter.etymHtml());

  const renderedSenses: RenderedSense[] = [];
  for (const [i, sense] of senses.entries()) {
    const label = `sense ${sense.senseNumber ?? i + 1}`;
    const html = await section(label, () => presenter.defHtml(sense));
    const quotes: RenderedQuote[] = [];
    for (const [j, cit] of sense.quotes.entries()) {
      quotes.push({ html: await section(`${label} quote ${j + 1}`, () => presenter.citHtml(cit)) });
    }
    renderedSenses.push({ senseNumber: sense.senseNumber, html, quotes });
  }

  const notes: (string | null)[] = [];
  for (const [i, note] of presenter.entry.notes.entries()) {
    notes.push(await section(`note ${i + 1}`, () => presenter.noteHtml(note)));
  }

  const supplements: RenderedSupplement[] = [];
  for (const [i, supplement] of presenter.entry.supplements.entries()) {
    const label = `supplement ${i + 1}`;
    const html = await section(label, () => presenter.supplementHtml(supplement));
    const quotes: RenderedQuote[] = [];
    for (const [j, cit] of supplement.quotes.entries()) {
      quotes.push({ html: await section(`${label} quote ${j + 1}`, () => presenter.citHtml(cit)) });
    }
    supplements.push({ html, quotes });
  }

  return {
    id: entryId,
    documentId: presenter.documentId(),
    heading: presenter.heading(),
    officialHeadword: presenter.highlightedOfficialHeadword(),
    otherSpellings: presenter.highlightedOtherSpellings(),
    partOfSpeech: presenter.partOfSpeechAbbrev(),
    quoteCount: presenter.quoteCount(),
    form,
    etym,
    senses: renderedSenses,
    notes,
    supplements,
    errors
  };
}
