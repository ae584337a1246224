import { type Request, type Response, Router } from 'express';
import { GetIndexStats } from '../../../application/useCases/GetIndexStats';
import type { Controller } from '../interfaces/Controller';

export class IndexController implements Controller {
    public path = '/index';
    public router = Router();

    constructor(private getIndexStats: GetIndexStats) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.get(`${this.path}/stats`, this.stats.bind(this));
        this.router.post(`${this.path}/verify`, this.verify.bind(this));
    }

    async stats(req: Request, res: Response) {
        res.json(this.getIndexStats.execute());
    }

    async verify(req: Request, res: Response) {
        const report = await this.getIndexStats.executeVerify();
        res.json(report);
    }
}
