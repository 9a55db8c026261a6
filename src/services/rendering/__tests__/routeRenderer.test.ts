import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { render } from '../routeRenderer';
import { RouteMap } from '../routeMap';
import { MissingWarehouseError } from '../../../errors/RouteErrors';
import { Location } from '../../../interfaces/Location';

const locations = new Map<string, Location>([
  ['warehouse', { lat: 52.5, lng: 13.4 }],
  ['bakery', { lat: 52.6, lng: 13.5 }],
]);

describe('render', () => {
  test('should center on the warehouse and convert the path to [lat, lng]', () => {
    const map = render(locations, [
      [13.4, 52.5],
      [13.45, 52.55],
      [13.5, 52.6],
    ]);

    expect(map.center).toEqual([52.5, 13.4]);
    expect(map.zoom).toBe(4);
    expect(map.polylines).toEqual([
      {
        points: [
          [52.5, 13.4],
          [52.55, 13.45],
          [52.6, 13.5],
        ],
        color: 'blue',
        weight: 2.5,
      },
    ]);
  });

  test('should place one marker per location in location order', () => {
    const map = render(locations, [[13.4, 52.5]]);

    expect(map.markers).toEqual([
      { name: 'warehouse', position: [52.5, 13.4] },
      { name: 'bakery', position: [52.6, 13.5] },
    ]);
  });

  test('should apply render options', () => {
    const map = render(locations, [], { zoomStart: 12, color: 'red', weight: 4 });

    expect(map.zoom).toBe(12);
    expect(map.polylines[0]).toEqual({ points: [], color: 'red', weight: 4 });
  });

  test('should raise MissingWarehouseError without a warehouse', () => {
    const noWarehouse = new Map<string, Location>([['bakery', { lat: 1, lng: 1 }]]);

    expect(() => render(noWarehouse, [])).toThrow(MissingWarehouseError);
    expect(() => render(noWarehouse, [])).toThrow("Location 'warehouse' is required to center the map");
  });
});

describe('RouteMap', () => {
  const map = new RouteMap({
    center: [0, 0],
    zoom: 4,
    polylines: [{ points: [[0, 0], [0.5, 0.5], [1, 1]], color: 'blue', weight: 2.5 }],
    markers: [
      { name: 'warehouse', position: [0, 0] },
      { name: `<b>Tom & Jerry's</b>`, position: [1, 2] },
    ],
  });

  test('toHtml should embed the map data for Leaflet', () => {
    const html = map.toHtml();

    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<title>Optimized route</title>');
    expect(html).toContain('"polylines":[{"points":[[0,0],[0.5,0.5],[1,1]],"color":"blue","weight":2.5}]');
    expect(html).toContain("const map = L.map('map').setView(route.center, route.zoom);");
  });

  test('toHtml should escape marker names', () => {
    const html = map.toHtml();

    expect(html).toContain('"name":"&lt;b&gt;Tom &amp; Jerry&#39;s&lt;/b&gt;"');
    expect(html).not.toContain('<b>Tom');
  });

  test('toHtml should not let embedded data close the script element', () => {
    const hostile = new RouteMap({
      center: [0, 0],
      zoom: 4,
      polylines: [],
      markers: [{ name: '</script><script>alert(1)</script>', position: [0, 0] }],
    });

    const html = hostile.toHtml();

    expect(html.match(/<\/script>/g)).toHaveLength(2);
  });

  test('toGeoJSON should return [lng, lat] positions', () => {
    expect(map.toGeoJSON()).toEqual({
      type: 'FeatureCollection',
      features: [
        {
          type: 'Feature',
          geometry: { type: 'LineString', coordinates: [[0, 0], [0.5, 0.5], [1, 1]] },
          properties: { color: 'blue', weight: 2.5 },
        },
        {
          type: 'Feature',
          geometry: { type: 'Point', coordinates: [0, 0] },
          properties: { name: 'warehouse' },
        },
        {
          type: 'Feature',
          geometry: { type: 'Point', coordinates: [2, 1] },
          properties: { name: `<b>Tom & Jerry's</b>` },
        },
      ],
    });
  });

  test('save should write the HTML page', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'route-map-'));
    const filePath = path.join(dir, 'map.html');

    await map.save(filePath);

    await expect(fs.readFile(filePath, 'utf-8')).resolves.toBe(map.toHtml());
    await fs.rm(dir, { recursive: true, force: true });
  });
});
