/**
 * @fileOverview Turns `**Brand Medicine:** <name>` lines in model output into
 * markdown links to the drug-search site.
 */

export const DRUG_SEARCH_URL = 'https://www.1mg.com/search/all';

// One line only: the name stops at the first line break, which must be present.
const BRAND_MEDICINE_LINE = /\*\*Brand Medicine:\*\* ([^\r\n]*?)(\r?\n)/gi;
// Link text may carry the backslash escapes `escapeLinkText` adds.
const MARKDOWN_LINK = /^\[(?:\\.|[^\]\\])*\]\([^)]*\)/;

export function drugSearchUrl(name: string): string {
  const url = new URL(DRUG_SEARCH_URL);
  url.searchParams.set('name', name);
  return url.toString();
}

function escapeLinkText(name: string): string {
  return name.replace(/([[\]])/g, '\\$1');
}

export function patchMedicineLinks(text: string): string {
  return text.replace(BRAND_MEDICINE_LINE, (line: string, rawName: string, lineBreak: string) => {
    const name = rawName.trim();
    if (!name || MARKDOWN_LINK.test(name)) return line;
    return `**Brand Medicine:** [${escapeLinkText(name)}](${drugSearchUrl(name)}) 🔗${lineBreak}`;
  });
}
