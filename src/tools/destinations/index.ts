export {
  type AddDestinationInput,
  AddDestinationInputSchema,
  type AddDestinationResult,
  addDestination,
} from "./add";
export {
  type ExplainMatchInput,
  ExplainMatchInputSchema,
  type ExplainMatchResult,
  explainMatch,
} from "./explain";
export {
  type GetDestinationInput,
  GetDestinationInputSchema,
  getDestination,
} from "./get";
export {
  type SearchDestinationsInput,
  SearchDestinationsInputSchema,
  searchDestinations,
} from "./search";
export { type DestinationView, toDestinationView } from "./view";
