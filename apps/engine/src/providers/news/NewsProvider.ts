/**
 * News Provider Interface
 */

export interface NewsHeadline {
    title: string;
    source: string;
    url: string;
    publishedAt: Date | null;
    description?: string;
    keywords: string[];
}

export interface NewsProvider {
    readonly name: string;

    /**
     * Recent headlines related to a subject
     */
    fetchRecent(topicHint: string): Promise<NewsHeadline[]>;

    isConfigured(): boolean;
}

const CONTEXT_HEADLINES = 10;
const DESCRIPTION_LIMIT = 200;
const RULE = '='.repeat(60);

/**
 * Render headlines as a prompt section; empty string when there are none
 */
export function formatNewsContext(headlines: NewsHeadline[]): string {
    if (headlines.length === 0) {
        return '';
    }

    const lines = ['TRENDING TECH NEWS:', RULE];
    headlines.slice(0, CONTEXT_HEADLINES).forEach((headline, index) => {
        lines.push(`\n${index + 1}. ${headline.title}`);
        lines.push(`   Source: ${headline.source}`);
        if (headline.description) {
            const description = headline.description.length > DESCRIPTION_LIMIT
                ? `${headline.description.slice(0, DESCRIPTION_LIMIT)}...`
                : headline.description;
            lines.push(`   ${description}`);
        }
    });
    lines.push(`\n${RULE}`);

    return lines.join('\n');
}
