import {
  AffineRasterMapper,
  PresentationRenderer,
  SimpleGeometryFactory,
  SpectralGeometryAdapter,
  classify,
  createDensitySlicingFromColormap,
  createFalseColorPresentation,
  createRasterImaging,
  rangeOf,
} from '../../src/index';

// Four-band 8-bit scene: blue, green, red, near infrared, 30 m cells
const factory = new SimpleGeometryFactory();
const adapter = new SpectralGeometryAdapter(factory);

const polygon = adapter.createSpectralPolygon({
  specification: { bandCount: 4, rows: 16, columns: 16, radiometricResolution: 8 },
  mapper: AffineRasterMapper.fromTransformation([500000, 5200000], [30, -30]),
  presentation: createFalseColorPresentation(3, 2, 1),
  imaging: createRasterImaging({
    time: new Date('2024-06-01T10:30:00Z'),
    sunElevation: 58.2,
    bands: [
      { description: 'Blue', radiometricResolution: 8, spectralRange: rangeOf('blue') },
      { description: 'Green', radiometricResolution: 8, spectralRange: rangeOf('green') },
      { description: 'Red', radiometricResolution: 8, spectralRange: rangeOf('red') },
      { description: 'NIR', radiometricResolution: 8, spectralRange: rangeOf('nearInfrared') },
    ],
  }),
  metadata: { scene: 'demo' },
});

// Vegetation-like gradient: low red, high near infrared towards the east
for (let row = 0; row < polygon.raster.rows; row++) {
  for (let column = 0; column < polygon.raster.columns; column++) {
    polygon.raster.setValues(row, column, [40, 60, 80 - column * 4, 60 + column * 12]);
  }
}

console.log(polygon.toString());
console.log('Envelope:', polygon.envelope);
console.log('850 nm is', [...classify(850e-9)].join(', '));

const renderer = new PresentationRenderer();
const colors = renderer.getColors(polygon.raster, polygon.presentation);
console.log('First pixel RGBA:', Array.from(colors.subarray(0, 4)));

// The scene stacked with a copy of itself, shown as 5 viridis classes of the first band
const stacked = adapter.mergeSpectralPolygons([polygon, adapter.cloneSpectralPolygon(polygon)], {
  presentation: createDensitySlicingFromColormap('viridis', { min: 0, max: 255, classes: 5 }),
  imaging: null,
});
console.log('Stacked bands:', stacked.bandCount);
if (stacked.presentation.kind === 'colorMap') {
  console.log('Density slicing keys:', [...stacked.presentation.colorMap.keys()].join(', '));
}
