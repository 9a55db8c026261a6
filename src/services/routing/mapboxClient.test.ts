import { MapboxOptions, MapboxRoutingService, toMapboxProfile } from './mapboxClient';
import {
  InvalidLocationsError,
  MalformedResponseError,
  RoutingServiceError,
} from '../../errors/RouteErrors';
import { Location } from '../../interfaces/Location';

const mockGetMatrix = jest.fn();
const mockGetDirections = jest.fn();

// Mock the Mapbox SDK services
jest.mock('@mapbox/mapbox-sdk/services/matrix', () => () => ({ getMatrix: mockGetMatrix }));
jest.mock('@mapbox/mapbox-sdk/services/directions', () => () => ({
  getDirections: mockGetDirections,
}));

const sendable = (send: jest.Mock) => ({ send, abort: jest.fn() });

const options: MapboxOptions = {
  accessToken: 'test-token',
  profile: 'driving',
  timeoutMs: 1000,
  maxRetries: 2,
  retryDelayMs: 0,
};

describe('MapboxRoutingService', () => {
  const locA: Location = { lat: 52.5, lng: 13.4 };
  const locB: Location = { lat: 52.6, lng: 13.5 };

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should require an access token', () => {
    expect(() => new MapboxRoutingService({ ...options, accessToken: '' })).toThrow(RoutingServiceError);
  });

  test('getDistanceMatrix should send points as [lng, lat] with distance annotations', async () => {
    mockGetMatrix.mockReturnValue(
      sendable(jest.fn().mockResolvedValue({ body: { code: 'Ok', distances: [[0, 900], [950, 0]] } }))
    );
    const service = new MapboxRoutingService(options);

    const matrix = await service.getDistanceMatrix([locA, locB]);

    expect(matrix).toEqual([
      [0, 900],
      [950, 0],
    ]);
    expect(mockGetMatrix).toHaveBeenCalledWith({
      points: [{ coordinates: [13.4, 52.5] }, { coordinates: [13.5, 52.6] }],
      profile: 'driving',
      annotations: ['distance'],
    });
  });

  test('getDistanceMatrix should answer a single location without a request', async () => {
    const service = new MapboxRoutingService(options);

    await expect(service.getDistanceMatrix([locA])).resolves.toEqual([[0]]);
    expect(mockGetMatrix).not.toHaveBeenCalled();
  });

  test('should reject more than 25 locations', async () => {
    const service = new MapboxRoutingService(options);
    const many = Array.from({ length: 26 }, (_, i) => ({ lat: i / 10, lng: i / 10 }));

    await expect(service.getDistanceMatrix(many)).rejects.toThrow(InvalidLocationsError);
    expect(mockGetMatrix).not.toHaveBeenCalled();
  });

  test('getRouteGeometry should request full GeoJSON directions', async () => {
    mockGetDirections.mockReturnValue(
      sendable(
        jest.fn().mockResolvedValue({
          body: { routes: [{ geometry: { type: 'LineString', coordinates: [[13.4, 52.5], [13.5, 52.6]] } }] },
        })
      )
    );
    const service = new MapboxRoutingService({ ...options, profile: 'walking' });

    const coordinates = await service.getRouteGeometry([locA, locB]);

    expect(coordinates).toEqual([
      [13.4, 52.5],
      [13.5, 52.6],
    ]);
    expect(mockGetDirections).toHaveBeenCalledWith({
      profile: 'walking',
      waypoints: [{ coordinates: [13.4, 52.5] }, { coordinates: [13.5, 52.6] }],
      geometries: 'geojson',
      overview: 'full',
    });
  });

  test('should raise MalformedResponseError when directions have no route', async () => {
    mockGetDirections.mockReturnValue(sendable(jest.fn().mockResolvedValue({ body: { routes: [] } })));
    const service = new MapboxRoutingService(options);

    await expect(service.getRouteGeometry([locA, locB])).rejects.toThrow(MalformedResponseError);
  });

  test('should map HTTP errors to RoutingServiceError without retrying', async () => {
    mockGetMatrix.mockReturnValue(
      sendable(
        jest.fn().mockRejectedValue({ type: 'HttpError', statusCode: 401, message: 'Not Authorized - Invalid Token' })
      )
    );
    const service = new MapboxRoutingService(options);

    const error = await service.getDistanceMatrix([locA, locB]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RoutingServiceError);
    expect(error).toMatchObject({
      status: 401,
      message: 'Failed to obtain distance matrix from Mapbox: Not Authorized - Invalid Token',
    });
    expect(mockGetMatrix).toHaveBeenCalledTimes(1);
  });

  test('should retry network errors with a fresh request', async () => {
    mockGetMatrix
      .mockReturnValueOnce(sendable(jest.fn().mockRejectedValue({ type: 'RequestAbortedError', message: 'socket hang up' })))
      .mockReturnValueOnce(sendable(jest.fn().mockResolvedValue({ body: { distances: [[0, 1], [1, 0]] } })));
    const service = new MapboxRoutingService(options);

    await expect(service.getDistanceMatrix([locA, locB])).resolves.toEqual([
      [0, 1],
      [1, 0],
    ]);
    expect(mockGetMatrix).toHaveBeenCalledTimes(2);
  });
});

describe('toMapboxProfile', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should keep supported profiles', () => {
    expect(toMapboxProfile('driving-traffic')).toBe('driving-traffic');
    expect(toMapboxProfile('cycling')).toBe('cycling');
    expect(warnSpy).not.toHaveBeenCalled();
  });

  test('should fall back to driving and warn about the rejected profile', () => {
    expect(toMapboxProfile('car')).toBe('driving');
    expect(warnSpy).toHaveBeenCalledWith("Mapbox does not support routing profile 'car', using 'driving'");
  });
});
