import * as zipcodes from "zipcodes";
import type { GeocodeRecord, GeocodingService } from "./ZipGeocoder";

// US ZIP centroids from the bundled `zipcodes` dataset. No network, no key.
export class OfflineZipDataset implements GeocodingService {
  async lookup(postalCode: string): Promise<GeocodeRecord | null> {
    const entry = zipcodes.lookup(postalCode);
    if (!entry) return null;
    return { latitude: entry.latitude, longitude: entry.longitude, regionCode: entry.state };
  }
}
