import { getDatabase } from '../../db';
import { CompanyFilters, CompanyRecord } from '../../types/domain';

export interface CompanyInput {
    name: string;
    domain?: string;
    industry?: string;
    country?: string;
    size?: string;
    linkedin_url?: string;
}

export interface CompanyFilterValues {
    industries: string[];
    countries: string[];
    sizes: string[];
    total_companies: number;
}

function normalizeFilterValues(values: string[]): string[] {
    return [...new Set(values.map((value) => value.trim().toLowerCase()).filter((value) => value.length > 0))];
}

export async function insertCompany(company: CompanyInput): Promise<void> {
    const db = await getDatabase();
    await db.run(
        `INSERT INTO companies (name, domain, industry, country, size, linkedin_url) VALUES (?, ?, ?, ?, ?, ?)`,
        [
            company.name.trim(),
            company.domain?.trim() ?? '',
            company.industry?.trim() ?? '',
            company.country?.trim() ?? '',
            company.size?.trim() ?? '',
            company.linkedin_url?.trim() ?? '',
        ]
    );
}

/**
 * Case-insensitive, trimmed IN match per column. An empty list leaves that column unfiltered.
 */
export async function findCompaniesByFilters(filters: CompanyFilters, limit: number | null = null): Promise<CompanyRecord[]> {
    const db = await getDatabase();
    const clauses: string[] = [];
    const params: unknown[] = [];
    const columns: Array<[keyof CompanyFilters, string]> = [['industry', 'industry'], ['country', 'country'], ['size', 'size']];

    for (const [key, column] of columns) {
        const values = normalizeFilterValues(filters[key]);
        if (values.length === 0) continue;
        clauses.push(`LOWER(TRIM(${column})) IN (${values.map(() => '?').join(', ')})`);
        params.push(...values);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const limitClause = limit !== null && limit > 0 ? 'LIMIT ?' : '';
    if (limitClause) params.push(limit);

    return db.query<CompanyRecord>(
        `SELECT id, name, domain, industry, country, size, linkedin_url FROM companies ${where} ORDER BY name ASC, id ASC ${limitClause}`,
        params
    );
}

async function distinctColumn(column: 'industry' | 'country' | 'size'): Promise<string[]> {
    const db = await getDatabase();
    const rows = await db.query<{ value: string }>(
        `SELECT DISTINCT TRIM(${column}) AS value FROM companies WHERE TRIM(COALESCE(${column}, '')) <> '' ORDER BY value ASC`
    );
    return rows.map((row) => row.value);
}

export async function getCompanyFilterValues(): Promise<CompanyFilterValues> {
    const db = await getDatabase();
    const total = await db.get<{ total: number | string }>(`SELECT COUNT(*) AS total FROM companies`);
    return {
        industries: await distinctColumn('industry'),
        countries: await distinctColumn('country'),
        sizes: await distinctColumn('size'),
        total_companies: Number(total?.total ?? 0),
    };
}
