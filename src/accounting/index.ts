export {
	type CommissionModel,
	commissionFromRisk,
	computeCommission,
	noCommission,
	turnoverCommission,
} from "./commission-model.js";
