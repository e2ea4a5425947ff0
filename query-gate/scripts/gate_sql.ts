/**
 * Gate SQL from the command line
 *
 * Usage:
 *   npm run gate -- [--tenant=acme] [--live] "SELECT ..." ["SELECT ..."]
 *
 * Each positional argument becomes one execute_query step. Without --live
 * the plan runs against the scripted backend, so nothing touches a database.
 * Prints the gate response as JSON.
 */

import { loadConfig } from "../src/config/loadConfig.js"
import { ScriptedQueryBackend } from "../src/query_backend.js"
import { createQueryGate } from "../src/query_gate.js"
import { queryPlan } from "../src/plan.js"

interface CliArgs {
	tenantId: string
	live: boolean
	sqls: string[]
}

function parseArgs(): CliArgs {
	const args = process.argv.slice(2)
	const cli: CliArgs = { tenantId: "default", live: false, sqls: [] }

	for (const arg of args) {
		if (arg.startsWith("--tenant=")) {
			cli.tenantId = arg.slice("--tenant=".length)
		} else if (arg === "--live") {
			cli.live = true
		} else {
			cli.sqls.push(arg)
		}
	}

	if (cli.sqls.length === 0) {
		console.error('Usage: gate_sql [--tenant=<id>] [--live] "<sql>" ["<sql>" ...]')
		process.exit(1)
	}
	return cli
}

async function main() {
	const cli = parseArgs()
	const config = loadConfig()
	const gate = createQueryGate(config, cli.live ? {} : { backend: new ScriptedQueryBackend() })

	try {
		const response = await gate.submit({
			tenantId: cli.tenantId,
			plan: queryPlan("cli", cli.sqls),
		})
		console.log(JSON.stringify(response, null, 2))
		if (response.responseType !== "executed") process.exitCode = 2
	} finally {
		await gate.close()
	}
}

main().catch((error) => {
	console.error("Unhandled error:", error)
	process.exit(1)
})
