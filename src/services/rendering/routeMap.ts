import { promises as fs } from 'fs';
import { Feature, FeatureCollection, Geometry } from 'geojson';
import { latLngToPosition } from '../../utils/coordinates';

export type LatLng = [number, number];

export interface MapMarker {
  name: string;
  position: LatLng;
}

export interface MapPolyline {
  points: LatLng[];
  color: string;
  weight: number;
}

export interface RouteMapData {
  center: LatLng;
  zoom: number;
  polylines: MapPolyline[];
  markers: MapMarker[];
}

const LEAFLET_VERSION = '1.9.4';
const TILE_URL = 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png';
const TILE_ATTRIBUTION = '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** JSON safe to inline in a <script> element */
function inlineJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

/**
 * Rendered route map: one Leaflet page with polylines and markers
 */
export class RouteMap {
  constructor(private readonly data: RouteMapData) {}

  get center(): LatLng {
    return this.data.center;
  }

  get zoom(): number {
    return this.data.zoom;
  }

  get markers(): readonly MapMarker[] {
    return this.data.markers;
  }

  get polylines(): readonly MapPolyline[] {
    return this.data.polylines;
  }

  /**
   * Self-contained HTML page (Leaflet and tiles load from their CDNs)
   */
  toHtml(title: string = 'Optimized route'): string {
    // Tooltips render HTML, so names are escaped before they are embedded
    const payload = {
      center: this.data.center,
      zoom: this.data.zoom,
      polylines: this.data.polylines,
      markers: this.data.markers.map((marker) => ({
        name: escapeHtml(marker.name),
        position: marker.position,
      })),
    };

    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${escapeHtml(title)}</title>
  <link rel="stylesheet" href="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.css" />
  <script src="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.js"></script>
  <style>html, body, #map { height: 100%; width: 100%; margin: 0; padding: 0; }</style>
</head>
<body>
  <div id="map"></div>
  <script>
    const route = ${inlineJson(payload)};
    const map = L.map('map').setView(route.center, route.zoom);
    L.tileLayer(${inlineJson(TILE_URL)}, { maxZoom: 19, attribution: ${inlineJson(TILE_ATTRIBUTION)} }).addTo(map);
    route.polylines.forEach((line) => {
      L.polyline(line.points, { color: line.color, weight: line.weight }).addTo(map);
    });
    route.markers.forEach((marker) => {
      L.marker(marker.position).bindTooltip(marker.name).addTo(map);
    });
  </script>
</body>
</html>
`;
  }

  /**
   * GeoJSON view of the map ([lng, lat] positions)
   */
  toGeoJSON(): FeatureCollection {
    const lines: Feature<Geometry>[] = this.data.polylines.map((line) => ({
      type: 'Feature',
      geometry: {
        type: 'LineString',
        coordinates: line.points.map(latLngToPosition),
      },
      properties: { color: line.color, weight: line.weight },
    }));

    const points: Feature<Geometry>[] = this.data.markers.map((marker) => ({
      type: 'Feature',
      geometry: {
        type: 'Point',
        coordinates: latLngToPosition(marker.position),
      },
      properties: { name: marker.name },
    }));

    return { type: 'FeatureCollection', features: [...lines, ...points] };
  }

  async save(filePath: string): Promise<void> {
    await fs.writeFile(filePath, this.toHtml(), 'utf-8');
  }
}
