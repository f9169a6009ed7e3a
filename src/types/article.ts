/**
 * ArticleRecord — one arXiv entry flattened out of the Atom feed.
 * Field names follow the exported column names.
 */
export interface ArticleRecord {
    /** Bare arXiv identifier including version (e.g., "2101.00001v2") */
    arxiv_id: string;

    /** ISO-8601 timestamp of the latest revision */
    updated_date: string;

    /** ISO-8601 timestamp of the first version */
    published_date: string;

    title: string;

    summary: string;

    /** Author names in document order (may be empty) */
    authors: string[];

    /** Free-text `arxiv:comment` annotation, e.g. "12 pages, 3 figures" */
    comment: string | null;

    /** Category terms in document order, primary category first */
    categories: string[];
}

/**
 * Secondary columns computed from an ArticleRecord.
 */
export interface DerivedFeatures {
    pages: number | null;
    figures: number | null;
    num_of_authors: number;

    /** Word count of the title */
    title_length: number;

    /** Parsed from `published_date`; null when the date is malformed */
    year_of_publishing: number | null;
    month_of_publishing: number | null;
    date_of_publishing: number | null;
}

/**
 * A record with its derived columns attached.
 * `citations` is present only when the citation lookup ran.
 */
export interface ArticleRow extends ArticleRecord, DerivedFeatures {
    citations?: number | null;
}

/**
 * Column order of the exported table.
 */
export const ARTICLE_COLUMNS = [
    'arxiv_id',
    'updated_date',
    'published_date',
    'title',
    'summary',
    'authors',
    'comment',
    'categories',
    'pages',
    'figures',
    'num_of_authors',
    'title_length',
    'year_of_publishing',
    'month_of_publishing',
    'date_of_publishing',
] as const satisfies ReadonlyArray<keyof ArticleRow>;

export type ArticleColumn = (typeof ARTICLE_COLUMNS)[number] | 'citations';
