/**
 * Builds dynamic SQL UPDATE statements from a partial object and a
 * field-to-column mapping. Keys left `undefined` are skipped.
 */

export type SqlValue = string | number | null;

export interface FieldMapping<T> {
    key: keyof T;
    column: string;
    transform?: (value: unknown) => SqlValue;
}

function toSqlValue(value: unknown): SqlValue {
    if (value === null || typeof value === 'string' || typeof value === 'number') {
        return value;
    }
    throw new Error(`Unsupported column value of type ${typeof value}`);
}

export class UpdateBuilder<T> {
    private fields: string[] = [];
    private values: SqlValue[] = [];

    constructor(
        private updates: Partial<T>,
        private mappings: FieldMapping<T>[]
    ) {
        this.build();
    }

    private build(): void {
        for (const mapping of this.mappings) {
            const value = this.updates[mapping.key];
            if (value !== undefined) {
                this.fields.push(`${mapping.column} = ?`);
                this.values.push(mapping.transform ? mapping.transform(value) : toSqlValue(value));
            }
        }
    }

    hasUpdates(): boolean {
        return this.fields.length > 0;
    }

    addTimestamp(column: string, at: number = Date.now()): this {
        this.fields.push(`${column} = ?`);
        this.values.push(at);
        return this;
    }

    toSql(table: string, idColumn = 'id'): string {
        return `UPDATE ${table} SET ${this.fields.join(', ')} WHERE ${idColumn} = ?`;
    }

    getValues(id: string): SqlValue[] {
        return [...this.values, id];
    }
}

export const transforms = {
    trimmedOrNull: (value: unknown): SqlValue => {
        if (typeof value !== 'string') return null;
        const trimmed = value.trim();
        return trimmed.length > 0 ? trimmed : null;
    },
};
