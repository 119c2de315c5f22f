/**
 * Prompt text for SQL Server SELECT generation.
 */

const RULES = `RULES (MUST FOLLOW):
- Use ONLY the tables and columns present in the provided DATABASE SCHEMA.
- If the question cannot be answered with the schema, output exactly: SELECT 'Unable to answer with provided schema' AS error;
- Generate ONLY ONE SQL statement.
- ONLY SELECT queries are allowed.
- NEVER use: INSERT, UPDATE, DELETE, DROP, ALTER, TRUNCATE, MERGE, CREATE, GRANT, REVOKE, EXEC, EXECUTE.
- Do NOT use comments, markdown, or code fences.
- Always limit results to TOP (100). If the question implies fewer rows, you may still use TOP (100).
- Put TOP only directly after SELECT (or SELECT DISTINCT), and only once.
- Do NOT use common table expressions (WITH ...).
- Use SQL Server compatible syntax.
- Prefer explicit schema qualification like [dbo].[TableName] when possible.
- Use bracket quoting for identifiers: [schema].[table], [column].
- Return ONLY the SQL text.`;

export function buildSystemPrompt(): string {
  return ['You are a senior data analyst writing Microsoft SQL Server queries.', '', RULES].join('\n');
}

export function buildUserPrompt(question: string, schemaContext: string): string {
  return [
    'DATABASE SCHEMA:',
    schemaContext,
    '',
    'USER QUESTION:',
    question.trim(),
    '',
    'Return ONLY SQL Server SQL.',
  ].join('\n');
}
