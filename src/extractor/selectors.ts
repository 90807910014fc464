/**
 * @module extractor/selectors
 * @fileoverview CSS selectors describing the forum's markup.
 *
 * The parsers take a {@link ForumSelectors} profile so a different forum
 * skin only needs a new profile, not new parsing code. The defaults match
 * the processors forum the crawler was written against.
 */

export interface ListingSelectors {
  /** One element per thread in a listing page. */
  item: string;
  /** Link inside an item carrying the title and detail URL. */
  link: string;
  /** Sibling of an item holding its answer-status marker. */
  statusCell: string;
  /** Markers inside the status cell that mean the thread has an answer. */
  answeredMarkers: string[];
  /** Markers inside the status cell that mean the thread has no answer. */
  unansweredMarkers: string[];
}

export interface DetailSelectors {
  /** Region holding the opening post's full text. */
  question: string;
  /**
   * Class-name fragments that mark an answer container. The first `div`
   * with a class containing any of them is taken as the answer.
   */
  answerClassFragments: string[];
  /** Content region inside the answer container. */
  answerContent: string;
}

export interface PaginationSelectors {
  /** "Last page" links; each carries its page number in `pageAttribute`. */
  lastPageLink: string;
  pageAttribute: string;
}

export interface ForumSelectors {
  listing: ListingSelectors;
  detail: DetailSelectors;
  pagination: PaginationSelectors;
}

export const DEFAULT_SELECTORS: ForumSelectors = {
  listing: {
    item: "div.name.cell",
    link: "a.internal-link.view-post",
    statusCell: "div.icon.cell.answer-status",
    answeredMarkers: [
      "a.ui-tip.verified.replace-with-icon.check[title^='Question answered']",
      "a.ui-tip.suggested.replace-with-icon.check[title^='Answer suggested']",
    ],
    unansweredMarkers: ["span.attribute-value.unanswered.ui-tip.replace-with-icon.help"],
  },
  detail: {
    question: "div.thread-start div.content.full div.content",
    answerClassFragments: ["suggested", "verified"],
    answerContent: "div.content",
  },
  pagination: {
    lastPageLink: "a.last[data-type='last']",
    pageAttribute: "data-page",
  },
};

/**
 * Collapse runs of whitespace to single spaces and trim the ends.
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
