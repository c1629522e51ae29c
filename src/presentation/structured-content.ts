export interface TocItem {
  id: string;
  level: number;
  text: string;
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/<[^>]+>/g, "")
    .replace(/&[a-z0-9#]+;/g, "")
    .replace(/[^a-z0-9\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}

/** Give h1-h4 stable ids and collect h2/h3 for the table of contents */
export function enrichHeadings(contentHtml: string): { html: string; toc: TocItem[] } {
  const counts = new Map<string, number>();
  const toc: TocItem[] = [];

  const html = contentHtml.replace(/<h([1-4])>([\s\S]*?)<\/h\1>/g, (_match, levelRaw: string, innerHtml: string) => {
    const level = parseInt(levelRaw, 10);
    const text = innerHtml.replace(/<[^>]+>/g, "").trim();
    const base = slugify(text) || "section";
    const count = (counts.get(base) ?? 0) + 1;
    counts.set(base, count);
    const id = count === 1 ? base : `${base}-${count}`;

    if ((level === 2 || level === 3) && text) {
      toc.push({ id, level, text });
    }

    return `<h${level} id="${id}">${innerHtml}</h${level}>`;
  });

  return { html, toc };
}

/** Nested list, h3 entries under the preceding h2 */
export function renderToc(toc: TocItem[]): string {
  if (toc.length === 0) {
    return "";
  }

  let html = "<ul>";
  let nested = false;
  let openItem = false;

  for (const item of toc) {
    const link = `<a href="#${item.id}">${item.text}</a>`;
    if (item.level === 3 && openItem) {
      if (!nested) {
        html += "<ul>";
        nested = true;
      }
      html += `<li>${link}</li>`;
      continue;
    }

    if (nested) {
      html += "</ul>";
      nested = false;
    }
    if (openItem) {
      html += "</li>";
    }
    html += `<li>${link}`;
    openItem = true;
  }

  if (nested) html += "</ul>";
  if (openItem) html += "</li>";
  return `<nav id="TableOfContents">${html}</ul></nav>`;
}
