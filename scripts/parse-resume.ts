import 'dotenv/config';
import * as fs from 'fs';
import { loadExtractionConfig } from '../src/lib/check-env';
import { createExtractionClient, describeClient } from '../src/lib/ai-router';
import { ResumeParser } from '../src/lib/resume-parser-service';
import { cleanResumeText } from '../src/lib/text-cleaner';
import { ResumeParserError } from '../src/lib/errors';

async function main() {
    const filePath = process.argv[2];
    if (!filePath) {
        console.error('Usage: npm run parse -- <resume.txt>');
        process.exitCode = 1;
        return;
    }

    const text = cleanResumeText(fs.readFileSync(filePath, 'utf-8'));
    console.log(`Loaded ${filePath}: ${text.length} chars after cleaning`);

    const config = loadExtractionConfig();
    const client = createExtractionClient(config);
    console.log(`Using ${describeClient(client)}`);

    const parser = new ResumeParser(client, { stopMarker: config.stopSequences[0] });
    const result = await parser.parseWithDetails(text);

    console.log(`\n--- RESULT (${result.path}, ${result.elapsed_ms}ms) ---`);
    console.log(JSON.stringify(result.record, null, 2));
}

main().catch((error: unknown) => {
    if (error instanceof ResumeParserError) {
        console.error(`❌ ${error.message}`);
    } else {
        console.error('❌ Unexpected failure:', error);
    }
    process.exitCode = 1;
});
