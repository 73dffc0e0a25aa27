/**
 * Greeter example
 *
 * Run with: npm run example
 * Try: npm run example -- -O limit=1 -O name=Reader
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { Logger, buildLoggerOptions, readLogConfig } from '@docbind/logging';
import { Duration, field, loadConfigSimple, parseCommandLine, Schema, type Infer } from '@docbind/config';

const GreeterConfig = Schema.define('GreeterConfig', {
	/** The name to greet */
	name: field().string(),
	/** Other people to greet */
	extraNames: field('extra_names').array(field().string()).setInfo(),
	/** Pause between greetings */
	frequency: field().duration().default(Duration.of('seconds', 1)),
	/** How many greetings to print (0: no limit) */
	limit: field().integer().optional()
});

type GreeterConfig = Infer<typeof GreeterConfig>;

async function greet(config: GreeterConfig, log: Logger): Promise<void> {
	for (let i = 0; config.limit === 0 || i < config.limit; ++i) {
		log.info(`Hello World to you ${config.name}`);
		if (config.extraNames.isSet) {
			log.info(`And to you too, ${config.extraNames.value.join(', ')}`);
		}
		await sleep(config.frequency.milliseconds);
	}
}

Logger.configure(buildLoggerOptions(readLogConfig()));

const args = parseCommandLine(process.argv.slice(2));
const config = loadConfigSimple(GreeterConfig, args);

if (config === undefined) {
	process.exitCode = 1;
} else {
	await greet(config, new Logger('Greeter'));
}
