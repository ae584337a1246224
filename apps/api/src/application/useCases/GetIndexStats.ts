import type { IndexStatsResponse } from '@doc-qa/types';
import { type ConsistencyReport, RetrievalEngine } from '../services/RetrievalEngine';

export class GetIndexStats {
    constructor(private engine: RetrievalEngine) {}

    execute(): IndexStatsResponse {
        return this.engine.stats();
    }

    async executeVerify(): Promise<ConsistencyReport> {
        return this.engine.verifyConsistency();
    }
}
