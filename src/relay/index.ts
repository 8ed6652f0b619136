export {
	DEFAULT_RELAY_DOMAIN,
	DELEGATED_CALL_TYPES,
	DelegatedAction,
	type DelegatedCall,
	type DelegatedCallDraft,
	type DelegatedRequest,
	type SignedDelegatedCall,
	decodeRequest,
	delegatedCallTypedData,
	encodeParams,
	signDelegatedCall,
} from "./delegated-call.js";
export { Relayer, type RelayerOptions } from "./relayer.js";
