import creditDoc from './credit.doc.json';

export const swaggerDocs = {
  openapi: '3.0.0',
  info: {
    title: 'Point-of-Sale Credit Decisioning API',
    version: '1.0.0',
    description: 'Risk scoring, loan terms, decision logging and drift monitoring'
  },
  servers: [
    { url: 'http://localhost:5000', description: 'Local Dev Server' }
  ],
  components: {
    schemas: {
      ...creditDoc.schemas,
    }
  },
  tags: [
    ...creditDoc.tags,
  ],
  paths: {
    ...creditDoc.paths,
  }
};
