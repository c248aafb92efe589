// CHANGE: Central export file for the output shell module

export {
	lawOutcomeLine,
	lawSummaryLine,
	mappedTreeLines,
	showScalar,
	usageLines,
} from "./printer-helpers.js";
export {
	printError,
	printLawReport,
	printMappedTree,
	printUsage,
} from "./printer.js";
