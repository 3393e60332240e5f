/**
 * Article Writer API Routes
 *
 * These are available at /api/article-writer/*
 */
export default {
  routes: [
    {
      method: 'POST',
      path: '/article-writer/generate',
      handler: 'article-writer.generate',
      config: {
        auth: false,
        policies: [],
      },
    },
    {
      method: 'GET',
      path: '/article-writer/status',
      handler: 'article-writer.status',
      config: {
        auth: false,
        policies: [],
      },
    },
  ],
};
