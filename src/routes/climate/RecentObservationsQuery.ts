import type { ObservationRepository } from "../../repositories/ObservationRepository";
import { currentWindowStart } from "./TrailingWindow";

/** Every temperature reading from the trailing year of the dataset, in fetch order. Missing readings stay null. */
export async function recentTemperatures( repository: ObservationRepository ): Promise<( number | null )[]> {
	return repository.queryTobs( await currentWindowStart( repository ) );
}
