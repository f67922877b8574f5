/**
 * Cooldown step - gives the GPU time to release memory between heavy stages.
 */

import { PipelineStep, PipelineContext } from '../PipelineInfrastructure';
import { Sleep, sleep } from '../../timing';

export class CooldownStep implements PipelineStep {
    readonly name: string;

    constructor(
        private readonly durationMs: number,
        label: string,
        private readonly wait: Sleep = sleep
    ) {
        this.name = `Cooldown(${label})`;
    }

    shouldSkip(): boolean {
        return this.durationMs <= 0;
    }

    async execute(context: PipelineContext): Promise<PipelineContext> {
        console.log(`[Pipeline] Cooling down for ${this.durationMs / 1000}s`);
        await this.wait(this.durationMs);
        return context;
    }
}
