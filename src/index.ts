import { createApp } from './app';
import env from './config/env';
import { getDocQueryService } from './modules/ragBot/service';

const main = async () => {
    try {
        const app = createApp(getDocQueryService());

        // Start Express server
        const server = app.listen(env.PORT, () => {
            console.log(`🚀 DocQuery API running on port ${env.PORT}`);
            console.log(`📊 Environment: ${env.NODE_ENV}`);
            console.log(`🔗 Health check: http://localhost:${env.PORT}/health`);
        });

        // Graceful shutdown handlers
        const gracefulShutdown = (signal: string) => {
            console.log(`\n${signal} received. Starting graceful shutdown...`);

            // Stop accepting new connections
            server.close(() => {
                console.log('✅ HTTP server closed');
                process.exit(0);
            });

            // Force shutdown after 30 seconds
            setTimeout(() => {
                console.error('⚠️ Forced shutdown after timeout');
                process.exit(1);
            }, 30000).unref();
        };

        // Listen for termination signals
        process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
        process.on('SIGINT', () => gracefulShutdown('SIGINT'));

        // Handle uncaught exceptions
        process.on('uncaughtException', (error) => {
            console.error('❌ Uncaught Exception:', error);
            gracefulShutdown('UNCAUGHT_EXCEPTION');
        });

        // Handle unhandled promise rejections
        process.on('unhandledRejection', (reason) => {
            console.error('❌ Unhandled Rejection:', reason);
            gracefulShutdown('UNHANDLED_REJECTION');
        });
    } catch (error) {
        console.error('❌ Failed to start server:', error);
        process.exit(1);
    }
};

void main();
