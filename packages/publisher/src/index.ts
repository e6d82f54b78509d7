export {
  YouTubeCredentialStore,
  CredentialsError,
  loopbackCodeReceiver,
  YOUTUBE_UPLOAD_SCOPE,
  type CodeReceiver,
  type CredentialStoreOptions,
  type LoopbackOptions,
  type StoredToken,
} from './credentials.js';
export {
  YouTubeUploader,
  UploadError,
  DEFAULT_UPLOAD_METADATA,
  YOUTUBE_CATEGORY_ID,
  RESUMABLE_UPLOAD_URL,
  acknowledgedOffset,
  watchUrl,
  type UploaderOptions,
  type YouTubeAuthorizer,
} from './uploader.js';
