export {
  FakeRasterEngine,
  PNG_SIGNATURE,
  JPEG_SOI,
  fakePageContent,
} from './fake-raster-engine';
