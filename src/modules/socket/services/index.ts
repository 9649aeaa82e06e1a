export { MediaStreamConnection, DUPLICATE_CALL_CLOSE_CODE } from './media-stream.service';
