import { getFlag, parseCliArgs } from "../cli/args";
import { builtInStrategies } from "./builtins";
import { createStrategyRegistry } from "./registry";

interface CliOptions {
	json: boolean;
}

const parseArgs = (): CliOptions => {
	const { args } = parseCliArgs(process.argv.slice(2));
	return {
		json: getFlag(args, "json"),
	};
};

const formatTable = (rows: { name: string; description: string }[]): string => {
	if (!rows.length) {
		return "(no strategies registered)";
	}
	const nameWidth = Math.max("Strategy".length, ...rows.map((row) => row.name.length));
	const header = `${pad("Strategy", nameWidth)} | Description`;
	const divider = `${"-".repeat(nameWidth)}-+-${"-".repeat("Description".length)}`;
	const body = rows
		.map((row) => `${pad(row.name, nameWidth)} | ${row.description}`)
		.join("\n");
	return `${header}\n${divider}\n${body}`;
};

const pad = (value: string, width: number): string => value.padEnd(width, " ");

const main = (): void => {
	const options = parseArgs();
	const registry = createStrategyRegistry(builtInStrategies);
	const summary = registry.list().map((entry) => ({
		name: entry.name,
		description: entry.description,
		parameters: entry.defaultParameters,
	}));

	if (options.json) {
		console.log(JSON.stringify(summary, null, 2));
		return;
	}

	console.log("Registered strategies:\n");
	console.log(formatTable(summary));
	console.log("\nUse --json to export machine-readable output.");
};

main();
