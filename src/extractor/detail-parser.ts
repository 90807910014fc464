/**
 * @module extractor/detail-parser
 * @fileoverview Extract the question and accepted answer from a thread page.
 *
 * Missing pieces never raise. They are reported with fixed placeholder
 * strings that the indexing pipeline treats as "present but empty":
 * {@link NO_QUESTION} and {@link NO_ANSWER}.
 */

import * as cheerio from "cheerio";
import { DEFAULT_SELECTORS, cleanText, type DetailSelectors } from "./selectors.js";

export const NO_QUESTION = "No Question Found";
export const NO_ANSWER = "No Answer Found";

export interface DetailContent {
  question: string;
  answer: string;
}

/**
 * Parse a thread page.
 *
 * - The question is the text of the thread-start content region.
 * - The answer is the content region of the first `div` whose class marks
 *   it as verified or suggested.
 *
 * Empty text counts as missing.
 *
 * @param body - Thread page markup, or `null` when the fetch failed.
 *
 * @example
 * ```ts
 * parseDetail(null);
 * // => { question: "No Question Found", answer: "No Answer Found" }
 * ```
 */
export function parseDetail(
  body: string | null | undefined,
  selectors: DetailSelectors = DEFAULT_SELECTORS.detail,
): DetailContent {
  if (!body) {
    return { question: NO_QUESTION, answer: NO_ANSWER };
  }

  const $ = cheerio.load(body);

  const question = cleanText($(selectors.question).first().text()) || NO_QUESTION;

  const answerContainer = $("div")
    .filter((_, element) => {
      const classes = ($(element).attr("class") ?? "").split(/\s+/);
      return classes.some((name) =>
        selectors.answerClassFragments.some((fragment) => name.includes(fragment)),
      );
    })
    .first();

  const answer =
    answerContainer.length > 0
      ? cleanText(answerContainer.find(selectors.answerContent).first().text()) || NO_ANSWER
      : NO_ANSWER;

  return { question, answer };
}
