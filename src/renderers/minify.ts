import { minify } from "html-minifier-terser";

const HTML_MINIFY_OPTIONS = {
  collapseWhitespace: true,
  conservativeCollapse: true,
  removeComments: true,
  minifyCSS: true,
  minifyJS: true,
  decodeEntities: false,
  keepClosingSlash: false,
};

export async function minifyHtml(html: string): Promise<string> {
  return minify(html, HTML_MINIFY_OPTIONS);
}
