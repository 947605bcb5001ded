export { AdvertisementsModule } from './advertisements.module.js';
export { CreateAdvertisementDto, UpdateAdvertisementDto } from './dto/index.js';
