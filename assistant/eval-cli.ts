#!/usr/bin/env node
import 'dotenv/config';
import { ConfigurationError, EvaluationCase, errorMessage } from '@care-companion/shared';
import { loadEvaluationCases } from './cases';
import { exitOnSetupError, flagValue, flagValues, hasFlag, parsePositiveInt } from './cli';
import { ModelConfig, loadConfig, loadModelConfigs } from './config';
import { Pipeline, createPipeline } from './pipeline';
import { analyzeFailures, buildImprovementPlan, formatReport } from './report';
import { writeImprovementPlan } from './run-store';

const args = process.argv.slice(2);

if (hasFlag(args, 'help')) {
    console.log('Usage:');
    console.log('  care-eval [--models <file>] [--cases <file>]... [--concurrency <n>] [--timeout-ms <n>] [--no-judge]');
    console.log('            [--plan <file>]   # also export an improvement plan as JSON');
    process.exit(0);
}

let pipeline: Pipeline;
let models: ModelConfig[];
let cases: EvaluationCase[];
let concurrency: number | undefined;
let totalTimeoutMs: number | undefined;
try {
    const config = loadConfig();
    if (!config.retrieval.baseUrl) {
        throw new ConfigurationError('Invalid configuration', ['RETRIEVAL_BASE_URL is required for evaluation runs']);
    }
    pipeline = createPipeline(config);
    const modelsFile = flagValue(args, 'models');
    models = modelsFile ? loadModelConfigs(modelsFile, config.chatModel) : [config.chatModel];
    cases = loadEvaluationCases(flagValues(args, 'cases'));
    concurrency = parsePositiveInt(flagValue(args, 'concurrency'), 'concurrency');
    totalTimeoutMs = parsePositiveInt(flagValue(args, 'timeout-ms'), 'timeout-ms');
} catch (err) {
    exitOnSetupError(err);
}

async function main(): Promise<void> {
    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.log('\nStopping: pairs already running will finish, the rest are cancelled.');
        controller.abort();
    });

    console.log('🧪 Care Companion evaluation');
    console.log('============================\n');
    console.log(`Cases: ${cases.length}`);
    console.log(`Model configurations: ${models.map((m) => m.id).join(', ')}`);
    console.log(`Judge: ${hasFlag(args, 'no-judge') ? 'disabled' : pipeline.config.judgeModel.model}\n`);

    const run = await pipeline.harness.run(cases, models, {
        concurrency,
        totalTimeoutMs,
        signal: controller.signal,
        judge: hasFlag(args, 'no-judge') ? null : pipeline.judge,
    });
    await pipeline.runs.save(run);

    const analysis = analyzeFailures(run.report, run.judgeScores, run.entries);
    console.log(formatReport(run.report, analysis));
    console.log(`\n✓ Run ${run.id} saved to ${pipeline.config.resultsDir}`);
    const planFile = flagValue(args, 'plan');
    if (planFile) {
        await writeImprovementPlan(planFile, buildImprovementPlan(run, analysis));
        console.log(`✓ Improvement plan written to ${planFile}`);
    }
    console.log(`  Review it with: care-review ${run.id} --reviewer <your-id>`);
}

main()
    .then(() => process.exit(0))
    .catch((err) => {
        console.error('\n✗ Evaluation failed:', errorMessage(err));
        process.exit(1);
    });
