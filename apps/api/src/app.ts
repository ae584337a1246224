import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { errorHandler } from './infrastructure/http/middleware/errorHandler';
import { apiRateLimiter } from './infrastructure/http/middleware/rateLimiter';
import { Core, type CoreDependencies } from './infrastructure/Core';
import { DocumentController } from './infrastructure/http/controllers/DocumentController';
import { QueryController } from './infrastructure/http/controllers/QueryController';
import { AskController } from './infrastructure/http/controllers/AskController';
import { IndexController } from './infrastructure/http/controllers/IndexController';
import { IngestDocument } from './application/useCases/IngestDocument';
import { GetDocuments } from './application/useCases/GetDocuments';
import { RemoveDocument } from './application/useCases/RemoveDocument';
import { QueryDocuments } from './application/useCases/QueryDocuments';
import { GetIndexStats } from './application/useCases/GetIndexStats';
import { Ask } from './application/useCases/ask/Ask';
import logger from './infrastructure/logger';

export class App {
    public app: express.Application;
    private core: Core;

    constructor(dependencies: CoreDependencies = {}) {
        this.app = express();
        this.core = new Core(dependencies);

        this.initializeMiddlewares();
        this.initializeControllers();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares() {
        this.app.use(helmet());
        this.app.use(express.json({ limit: '5mb' }));
        this.app.use(apiRateLimiter);

        this.app.use(cors({
            origin: process.env.CORS_ORIGIN || '*',
            methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        }));
    }

    private initializeControllers() {
        const documentController = new DocumentController(
            this.core.getUseCase(IngestDocument),
            this.core.getUseCase(GetDocuments),
            this.core.getUseCase(RemoveDocument),
        );
        const queryController = new QueryController(this.core.getUseCase(QueryDocuments));
        const askController = new AskController(this.core.getUseCase(Ask));
        const indexController = new IndexController(this.core.getUseCase(GetIndexStats));
        const controllers = [
            documentController,
            queryController,
            askController,
            indexController,
        ];
        controllers.forEach((controller) => {
            this.app.use('/', controller.router);
        });
    }

    private initializeErrorHandling() {
        this.app.use(errorHandler);
    }

    public listen() {
        const port = Number(process.env.PORT) || 6060;
        this.app.listen(port, () => {
            logger.info(`Server running on http://localhost:${port}`);
        });
    }
}
