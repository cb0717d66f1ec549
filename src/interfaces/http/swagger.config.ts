import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '@config/index.js';

const swaggerOptions: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Generic Repository API',
      version: '0.1.0',
      description: 'API de demostración del repositorio genérico sobre TypeORM',
      license: {
        name: 'MIT'
      }
    },
    servers: [
      {
        url: env.API_URL,
        description: 'Servidor de desarrollo'
      }
    ],
    components: {
      schemas: {
        Error: {
          type: 'object',
          properties: {
            code: {
              type: 'string',
              description: 'Código de error legible'
            },
            message: {
              type: 'string',
              description: 'Mensaje de error para el usuario'
            },
            metadata: {
              type: 'object',
              description: 'Detalles adicionales (issues de validación, entidad en conflicto)'
            }
          }
        },
        Product: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            name: { type: 'string', maxLength: 200 },
            price: { type: 'number' }
          }
        },
        ProductInput: {
          type: 'object',
          required: ['name', 'price'],
          properties: {
            id: { type: 'string', format: 'uuid' },
            name: { type: 'string', maxLength: 200 },
            price: { type: 'number', minimum: 0 }
          }
        }
      }
    },
    tags: [
      { name: 'Products', description: 'Operaciones del repositorio genérico sobre productos' },
      { name: 'Health', description: 'Estado del servicio' }
    ]
  },
  apis: ['./src/interfaces/http/routes/**/*.ts', './src/modules/**/controllers/*.ts']
};

let swaggerSpec: object | null = null;

/**
 * Genera la especificación OpenAPI a partir de los comentarios `@swagger` la primera
 * vez que se pide.
 */
export const getSwaggerSpec = (): object => {
  if (!swaggerSpec) {
    swaggerSpec = swaggerJsdoc(swaggerOptions);
  }

  return swaggerSpec;
};
