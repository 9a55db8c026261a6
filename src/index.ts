import { config } from './config/environment';
import { createApp } from './app';
import { createRoutingService } from './services/routing';

const startServer = () => {
  try {
    const routing = createRoutingService(config.routing);
    const app = createApp(routing, config);

    app.listen(config.port, () => {
      console.log(`✓ Server running on http://localhost:${config.port}`);
      console.log(`✓ Health check: http://localhost:${config.port}/health`);
      console.log(`✓ Routing provider: ${routing.name} (strategy: ${config.strategy})`);
    });
  } catch (error) {
    console.error('✗ Failed to start server:', error);
    process.exit(1);
  }
};

startServer();
