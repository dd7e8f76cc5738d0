// @citation-js/core ships JavaScript only and has no @types package.
declare module '@citation-js/core' {
  export interface CiteInputOptions {
    forceType?: string;
    generateGraph?: boolean;
  }

  export class Cite {
    constructor(data?: unknown, options?: CiteInputOptions);
    data: unknown[];
    format(format: string): string;
  }

  export const plugins: {
    config: {
      get(plugin: '@bibtex'): { format: { checkLabel: boolean } };
    };
  };
}

// Registers the BibTeX input/output formats with @citation-js/core on import.
declare module '@citation-js/plugin-bibtex';
