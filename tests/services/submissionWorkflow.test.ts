import { SubmissionWorkflow } from '../../src/services/submissionWorkflow';
import { HemisphereRef } from '../../src/types/survey';
import { UpstreamFailureError } from '../../src/utils/errors';
import { dms, FakeGpsReader, FakeUploader, InMemoryRowStore, validFields } from '../helpers/fakes';

describe('SubmissionWorkflow', () => {
  let store: InMemoryRowStore;
  let uploader: FakeUploader;
  let gpsReader: FakeGpsReader;
  let workflow: SubmissionWorkflow;

  const image = { data: Buffer.from('jpeg-bytes'), filename: 'pothole.jpg' };

  beforeEach(() => {
    store = new InMemoryRowStore();
    uploader = new FakeUploader();
    gpsReader = new FakeGpsReader();
    workflow = new SubmissionWorkflow({ store, uploader, gpsReader });
  });

  it('should store a manual location submission', async () => {
    const outcome = await workflow.submit({
      fields: validFields,
      location: { method: 'manual', latitude: -33.8688, longitude: 151.2093 }
    });

    expect(outcome.ok).toBe(true);
    expect(store.rows).toHaveLength(1);
    expect(store.lastRow()).toMatchObject({
      'Latitude': -33.8688,
      'Longitude': 151.2093,
      'Image URL': ''
    });
    expect(uploader.uploads).toHaveLength(0);
  });

  it('should reject missing required fields before uploading or storing', async () => {
    const outcome = await workflow.submit({
      fields: { ...validFields, roadName: '' },
      location: { method: 'image' },
      image
    });

    expect(outcome).toEqual({ ok: false, error: { kind: 'MissingRequiredField', field: 'Road Name' } });
    expect(uploader.uploads).toHaveLength(0);
    expect(gpsReader.reads).toHaveLength(0);
    expect(store.rows).toHaveLength(0);
  });

  it('should reject a negative measurement without storing', async () => {
    const outcome = await workflow.submit({
      fields: { ...validFields, distressLength: -1 },
      location: { method: 'none' }
    });

    expect(outcome).toEqual({ ok: false, error: { kind: 'InvalidNumeric', field: 'Distress Length (m)' } });
    expect(store.rows).toHaveLength(0);
  });

  it('should convert image GPS tags and store the uploaded image URL', async () => {
    gpsReader.result = {
      status: 'found',
      tags: {
        latitude: { angle: dms(40, 26, 46), ref: HemisphereRef.NORTH },
        longitude: { angle: dms(79, 58, 56), ref: HemisphereRef.WEST }
      }
    };

    const outcome = await workflow.submit({ fields: validFields, location: { method: 'image' }, image });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;

    expect(outcome.location.method).toBe('image');
    expect(outcome.location.coordinate?.latitude).toBeCloseTo(40.446111, 6);
    expect(outcome.location.coordinate?.longitude).toBeCloseTo(-79.982222, 6);
    expect(outcome.imageUrl).toBe('https://i.ibb.co/test/pothole.jpg');
    expect(outcome.uploadStatus).toBe('uploaded');
    expect(outcome.warnings).toEqual([]);
    expect(uploader.uploads).toEqual([{ size: image.data.length, filename: 'pothole.jpg' }]);
    expect(store.lastRow()?.['Image URL']).toBe('https://i.ibb.co/test/pothole.jpg');
  });

  it('should store empty coordinates when only one GPS axis converts', async () => {
    gpsReader.result = {
      status: 'found',
      tags: {
        latitude: { angle: dms(40, 26, 46), ref: HemisphereRef.NORTH },
        longitude: { angle: dms(79, 58, 56), ref: null }
      }
    };

    const outcome = await workflow.submit({ fields: validFields, location: { method: 'image' }, image });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;

    expect(outcome.location.coordinate).toBeNull();
    expect(outcome.warnings).toEqual(['PARTIAL_GPS_DATA']);
    expect(store.lastRow()).toMatchObject({ 'Latitude': '', 'Longitude': '' });
  });

  it('should warn when the image has no GPS data', async () => {
    const outcome = await workflow.submit({ fields: validFields, location: { method: 'image' }, image });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.location.coordinate).toBeNull();
    expect(outcome.warnings).toEqual(['NO_GPS_DATA']);
  });

  it('should warn when the image cannot be read', async () => {
    gpsReader.result = { status: 'unreadable', error: 'Invalid image format' };

    const outcome = await workflow.submit({ fields: validFields, location: { method: 'image' }, image });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.warnings).toEqual(['IMAGE_UNREADABLE']);
  });

  it('should keep device accuracy with the resolved location', async () => {
    const outcome = await workflow.submit({
      fields: validFields,
      location: { method: 'device', latitude: 51.5074, longitude: -0.1278, accuracy: 12 }
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.location).toEqual({
      method: 'device',
      coordinate: { latitude: 51.5074, longitude: -0.1278 },
      accuracy: 12
    });
  });

  it('should drop out-of-range decimal coordinates', async () => {
    const outcome = await workflow.submit({
      fields: validFields,
      location: { method: 'manual', latitude: 123, longitude: 10 }
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.location.coordinate).toBeNull();
    expect(outcome.warnings).toEqual(['COORDINATES_OUT_OF_RANGE']);
  });

  it('should still store the record when the image upload fails', async () => {
    uploader.nextUrl = null;

    const outcome = await workflow.submit({
      fields: validFields,
      location: { method: 'manual', latitude: 1, longitude: 2 },
      image
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.imageUrl).toBeNull();
    expect(outcome.uploadStatus).toBe('failed');
    expect(outcome.warnings).toEqual(['IMAGE_UPLOAD_FAILED']);
    expect(store.lastRow()?.['Image URL']).toBe('');
  });

  it('should skip the upload when the uploader is disabled', async () => {
    uploader.enabled = false;

    const outcome = await workflow.submit({ fields: validFields, location: { method: 'none' }, image });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.uploadStatus).toBe('skipped');
    expect(outcome.warnings).toEqual(['IMAGE_UPLOAD_DISABLED']);
    expect(uploader.uploads).toHaveLength(0);
  });

  it('should propagate row store failures', async () => {
    store.failAppends = true;

    await expect(workflow.submit({ fields: validFields, location: { method: 'none' } }))
      .rejects.toBeInstanceOf(UpstreamFailureError);
  });
});
