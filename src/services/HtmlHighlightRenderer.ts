/**
 * HtmlHighlightRenderer: segment list → highlight markup for the preview.
 * Uses linkedom to build the markup, so every text node and attribute goes
 * through the DOM serializer and entity text is never parsed as markup.
 */

import { parseHTML } from "linkedom";
import type { Segment } from "./EntityOverlay.types";
import { colorFor } from "../config/labelStyles";
import { RENDER_DEFAULTS } from "../config/constants";

type HtmlDocument = ReturnType<typeof parseHTML>["document"];
type HtmlElement = ReturnType<HtmlDocument["createElement"]>;

/** Append text, turning each newline into a <br>. */
function appendText(document: HtmlDocument, parent: HtmlElement, text: string): void {
  const lines = text.split("\n");
  lines.forEach((line, i) => {
    if (i > 0) parent.appendChild(document.createElement("br"));
    if (line.length > 0) parent.appendChild(document.createTextNode(line));
  });
}

export function renderHtml(segments: readonly Segment[]): string {
  const { document } = parseHTML("<!DOCTYPE html><html><body></body></html>");

  const container = document.createElement("div");
  container.setAttribute("class", RENDER_DEFAULTS.CONTAINER_CLASS);

  for (const segment of segments) {
    if (segment.label === null) {
      appendText(document, container, segment.text);
      continue;
    }

    const mark = document.createElement("mark");
    mark.setAttribute("class", RENDER_DEFAULTS.ENTITY_CLASS);
    mark.setAttribute("data-label", segment.label);
    mark.setAttribute("style", `background: ${colorFor(segment.label, "screen")}`);
    appendText(document, mark, segment.text);

    const tag = document.createElement("span");
    tag.setAttribute("class", RENDER_DEFAULTS.LABEL_CLASS);
    tag.textContent = segment.label;
    mark.appendChild(tag);

    container.appendChild(mark);
  }

  return container.outerHTML;
}
