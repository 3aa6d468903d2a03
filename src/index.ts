import 'dotenv/config';
import { closeServer, createApp } from './app';
import { loadConfig } from './config';
import { createExpenseStore } from './expenseStore';
import { createTracker } from './tracker';

// Initialize the store and start server
function start(): void {
  try {
    const config = loadConfig();
    const store = createExpenseStore(config.expenseFile);
    const tracker = createTracker({ store, categories: config.categories });
    const app = createApp(tracker, { currency: config.currency, password: config.password });

    const server = app.listen(config.port, () => {
      console.log(`Expense Tracker API running on http://localhost:${config.port}`);
      console.log(`Expenses file: ${store.filePath}`);
      if (config.password) {
        console.log('Access password required (x-tracker-password header)');
      }
      console.log('Available endpoints:');
      console.log('  POST   /budget               - Set income and savings goal for this session');
      console.log('  GET    /budget               - Current budget per category');
      console.log('  GET    /budget/guide         - How the budget is calculated (query: income)');
      console.log('  POST   /expenses             - Add a new expense');
      console.log('  GET    /expenses             - List expenses');
      console.log('  DELETE /expenses/:selection  - Delete an expense by position');
      console.log('  POST   /savings-use          - Record money taken from savings');
      console.log('  GET    /summary              - Budget vs actual (query: year, month, period, format)');
      console.log('  GET    /categories           - List categories');
      console.log('  GET    /health               - Health check');
    });

    // Graceful shutdown
    const shutdown = () => {
      console.log('\nShutting down gracefully...');
      closeServer(server).then(
        () => process.exit(0),
        error => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        }
      );
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

start();
