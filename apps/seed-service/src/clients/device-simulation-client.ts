import { ok, type ResultAsync } from 'neverthrow';
import type { StoreError } from '../seed/errors.js';
import { SimulationSchema, type Simulation } from '../seed/template.js';
import type { SimulationStore } from '../seed/types.js';
import { JsonHttpClient, encodePath, expectSuccess, parseBody, type HttpClientOptions } from './http.js';

const RESOURCE = 'device-simulation';

/** The simulation service keeps a single default simulation under this id */
export const DEFAULT_SIMULATION_ID = '1';

/**
 * Client for the device simulation service.
 */
export class DeviceSimulationClient implements SimulationStore {
	private readonly http: JsonHttpClient;

	constructor(options: HttpClientOptions) {
		this.http = new JsonHttpClient(RESOURCE, options);
	}

	getDefault(): ResultAsync<Simulation | null, StoreError> {
		return this.http.get(encodePath('simulations', DEFAULT_SIMULATION_ID)).andThen((response) => {
			if (response.statusCode === 404) {
				return ok(null);
			}
			return expectSuccess(RESOURCE, response).andThen((success) => parseBody(RESOURCE, SimulationSchema, success));
		});
	}

	create(simulation: Simulation): ResultAsync<void, StoreError> {
		const id = simulation.id ?? DEFAULT_SIMULATION_ID;
		return this.http
			.put(encodePath('simulations', id), { ...simulation, id })
			.andThen((response) => expectSuccess(`${RESOURCE} simulation ${id}`, response))
			.map(() => undefined);
	}
}
