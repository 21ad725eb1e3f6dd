export {
	assertAccountBalance,
	assertBankMatchesLedger,
	assertLedgerBalanced,
	assertPostingsBalanced,
} from "./assertions.js";
export {
	getTestInstance,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
