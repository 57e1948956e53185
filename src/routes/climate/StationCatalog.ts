import type { ObservationRepository } from "../../repositories/ObservationRepository";

export async function listStations( repository: ObservationRepository ): Promise<string[]> {
	return repository.distinctStations();
}
