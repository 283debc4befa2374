// Run: npm run ask -- --question="What is the 5-year survival of patients with type 2 diabetes?"
//  or: npm run ask -- --sql="SELECT COUNT(*) FROM person"

import dotenv from "dotenv";
import { AnalysisDispatcher } from "./src/analysis/registry";
import { ConceptCatalog } from "./src/conceptCache";
import { loadSettings } from "./src/config";
import { PgDataStore } from "./src/db";
import { createLogger, setLogLevel } from "./src/logger";
import { OpenAIReasoningService } from "./src/openaiClient";
import { Orchestrator } from "./src/orchestrator";

dotenv.config();

const log = createLogger("ask");

// --- parse CLI args ---
function parseArgs() {
    const argMap: Record<string, string> = {};
    for (const a of process.argv.slice(2)) {
        const eq = a.indexOf("=");
        if (eq > 0) argMap[a.slice(0, eq).replace(/^--/, "").toLowerCase()] = a.slice(eq + 1);
    }
    const question = argMap["question"]?.trim();
    const sql = argMap["sql"]?.trim();
    if (!question && !sql) {
        console.error('❌ Usage: npm run ask -- --question="..." | --sql="SELECT ..."');
        process.exit(1);
    }
    return { question, sql };
}

async function main() {
    const { question, sql } = parseArgs();
    const settings = loadSettings();
    setLogLevel(settings.logLevel);

    const store = new PgDataStore(settings.db);
    try {
        const llm = new OpenAIReasoningService(settings.llm);
        const catalog = question ? await ConceptCatalog.load(store) : ConceptCatalog.empty();
        const orchestrator = new Orchestrator({
            llm,
            store,
            catalog,
            schema: settings.db.schema,
            dispatcher: new AnalysisDispatcher(store, llm, {
                minCohortSize: settings.minCohortSize,
                labelTimeoutMs: settings.llm.labelTimeoutMs,
            }),
        });

        const result = question ? await orchestrator.answer(question) : await orchestrator.executeSql(sql ?? "");
        console.log(JSON.stringify(result, null, 2));
        if (result.error) process.exitCode = 1;
        else log.info(`Done in ${result.elapsedS}s`);
    } finally {
        await store.close();
    }
}

main().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
});
