import { config } from './config/app.js';
import { buildApp } from './app.js';
import { createReportService } from './services/reportService.js';
import { AnalyticStore } from './store/analyticStore.js';

const store = AnalyticStore.open();
const app = await buildApp({ reportService: createReportService(store), store });

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((signal) => {
  process.on(signal, async () => {
    app.log.info(`Received ${signal}, shutting down gracefully.`);
    await app.close();
    store.close();
    process.exit(0);
  });
});

try {
  await app.listen({ port: config.PORT, host: '0.0.0.0' });
  app.log.info(`Surveillance agent running on http://localhost:${config.PORT}`);
} catch (error) {
  app.log.error(error);
  store.close();
  process.exit(1);
}
