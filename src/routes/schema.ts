/**
 * Schema routes — GET /tables and GET /schema, served from the schema cache
 * loaded at startup.
 */

import type { FastifyInstance } from 'fastify';
import type { SchemaContextService } from '../ai/schemaContext.js';

export interface SchemaRoutesDeps {
  schemaContextService: SchemaContextService;
}

export async function schemaRoutes(fastify: FastifyInstance, deps: SchemaRoutesDeps) {
  const { schemaContextService } = deps;

  fastify.get('/tables', async (_request, reply) => {
    return reply.status(200).send({
      success: true,
      data: { tables: schemaContextService.listTableNames() },
    });
  });

  fastify.get('/schema', async (_request, reply) => {
    const tables = schemaContextService.getSchema().tables.map((table) => ({
      schema: table.schema,
      name: table.name,
      type: table.tableType,
      columns: table.columns.map((column) => ({
        name: column.name,
        dataType: column.dataType,
        isNullable: column.isNullable,
        maxLength: column.maxLength,
        precision: column.precision,
        scale: column.scale,
      })),
    }));

    return reply.status(200).send({
      success: true,
      data: { tables },
    });
  });
}
