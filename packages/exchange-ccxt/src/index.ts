export {
	CcxtBrokerClient,
	createCcxtExchange,
	toBrokerError,
} from "./ccxtBrokerClient";
export type { CcxtBrokerClientOptions } from "./ccxtBrokerClient";
