import { serve } from '@hono/node-server';
import { API_VERSION, createApp } from './app.js';

const app = createApp({ apiKey: process.env.DEBT_PLANNER_API_KEY });
const port = parseInt(process.env.PORT ?? '3000');

serve({ fetch: app.fetch, port }, (info) => {
  console.log(`Debt Planner API v${API_VERSION} → http://localhost:${info.port}`);
});
