#!/usr/bin/env node
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import {
    TFE_CONFIG_GUARDS,
    connectionInputFromEnv,
    runtimeSettingsFromEnv
} from "../../../libs/bootstrap/config/tfe-config.js";
import { summarizeValidation, validateConnection } from "../../../libs/config/connectionValidator.js";
import { describeError } from "../../../libs/errors/sanitizer.js";
import { plainTextFormatter } from "../../../libs/execution/errorFormatter.js";
import { logger } from "../../../libs/logging/logger.js";
import { CredentialStore } from "../../../libs/secrets/CredentialStore.js";
import { PlanStore } from "../../../libs/secrets/PlanStore.js";
import { TfeClient } from "../../../libs/tfe/TfeClient.js";

async function main(): Promise<number> {
    // Fail-closed on missing TFE_* variables
    ConfigGuard.enforce(TFE_CONFIG_GUARDS);
    const settings = runtimeSettingsFromEnv();

    const validation = validateConnection(connectionInputFromEnv());
    if (!validation.ok) {
        logger.error({ errors: validation.errors.map(issue => issue.code) }, "Connection configuration rejected");
        process.stderr.write(`${summarizeValidation(validation)}\n`);
        return 1;
    }
    for (const warning of validation.warnings) {
        logger.warn({ field: warning.field, code: warning.code }, warning.message);
    }

    const descriptor = validation.descriptor;
    const credentials = new CredentialStore({ timeoutSeconds: settings.sessionTimeoutSeconds });
    const plans = new PlanStore({ timeoutSeconds: settings.sessionTimeoutSeconds });
    credentials.store(descriptor, "environment");
    logger.info({ connection: credentials.getMaskedSummary() }, "Credentials loaded");

    const client = new TfeClient({
        credentials,
        plans,
        retry: { baseDelayMs: settings.retryBaseDelayMs, formatter: plainTextFormatter }
    });

    const abort = new AbortController();
    const onSigint = () => abort.abort();
    process.once("SIGINT", onSigint);

    try {
        const connection = await client.validateConnection(abort.signal);
        if (!connection.reachable) {
            process.stderr.write(`${connection.message}\n`);
            return 1;
        }

        const auth = await client.authenticate(abort.signal);
        if (!auth.authenticated) {
            process.stderr.write(`${auth.error}\n`);
            return 1;
        }

        const result = await client.getPlanJson(descriptor.workspace_id, descriptor.run_id, { signal: abort.signal });
        if (result.error !== null) {
            process.stderr.write(`${result.error}\n`);
            return 1;
        }

        process.stdout.write(`${JSON.stringify(plans.getMaskedSummary(), null, 2)}\n`);
        return 0;
    } finally {
        process.removeListener("SIGINT", onSigint);
        await client.close();
        credentials.dispose();
        plans.dispose();
    }
}

main().then(code => {
    process.exitCode = code;
}).catch(err => {
    logger.fatal({ error: describeError(err) }, "plan-fetcher failed");
    process.exitCode = 1;
});
