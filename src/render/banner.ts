import figlet from 'figlet';

export interface BannerFont {
  /** Block-letter art for `text`, lines separated by '\n'. */
  render(text: string): string;
}

/** figlet's bundled Standard font. */
export class FigletFont implements BannerFont {
  render(text: string): string {
    return figlet.textSync(text, { font: 'Standard' });
  }
}
