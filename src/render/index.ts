export { SlideRenderer, OPEN_PROMPT, type SlideRendererDeps } from './dispatch.js';
export * from './layout.js';
export { TerminalMarkdownRenderer, type MarkdownRenderer } from './markdown.js';
export { CliHighlighter, loadCodeTheme, type SyntaxHighlighter } from './source.js';
export { FigletFont, type BannerFont } from './banner.js';
