import {
  S3Client,
  BucketLocationConstraint,
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteObjectsCommand,
  HeadBucketCommand,
  ListObjectVersionsCommand,
  ListObjectsV2Command,
  PutBucketTaggingCommand,
  PutBucketVersioningCommand,
  PutObjectCommand,
  PutPublicAccessBlockCommand,
  type CreateBucketConfiguration,
  type ObjectIdentifier
} from '@aws-sdk/client-s3';
import { readFileSync } from 'fs';
import { ResourceTags, StorageService, UploadResult, AwsClientOptions } from './types.js';
import { callProvider, probeExists } from './aws-errors.js';
import { toTagList } from './tags.js';
import { ConfigurationError } from '../errors/index.js';

const LOCATION_CONSTRAINTS: readonly string[] = Object.values(BucketLocationConstraint);

export function isBucketLocationConstraint(region: string): region is BucketLocationConstraint {
  return LOCATION_CONSTRAINTS.includes(region);
}

/** us-east-1 is the default location and must not be sent as a constraint */
export function bucketConfiguration(region: string): CreateBucketConfiguration | undefined {
  if (region === 'us-east-1') {
    return undefined;
  }
  if (!isBucketLocationConstraint(region)) {
    throw new ConfigurationError(`S3 does not accept ${region} as a bucket location`);
  }
  return { LocationConstraint: region };
}

export function objectUrl(bucketName: string, region: string, key: string): string {
  return `https://${bucketName}.s3.${region}.amazonaws.com/${key}`;
}

export class S3Manager implements StorageService {
  private client: S3Client;
  readonly region: string;

  constructor(options: AwsClientOptions) {
    this.region = options.region;
    this.client = new S3Client({ region: options.region, profile: options.profile });
  }

  async bucketExists(bucketName: string): Promise<boolean> {
    return probeExists(`head bucket ${bucketName}`, async () => {
      await this.client.send(new HeadBucketCommand({ Bucket: bucketName }));
      return true;
    });
  }

  async createBucket(bucketName: string): Promise<void> {
    const configuration = bucketConfiguration(this.region);
    await callProvider(`create S3 bucket ${bucketName}`, () =>
      this.client.send(new CreateBucketCommand({
        Bucket: bucketName,
        CreateBucketConfiguration: configuration
      }))
    );
  }

  async tagBucket(bucketName: string, tags: ResourceTags): Promise<void> {
    await callProvider(`tag S3 bucket ${bucketName}`, () =>
      this.client.send(new PutBucketTaggingCommand({
        Bucket: bucketName,
        Tagging: { TagSet: toTagList(tags) }
      }))
    );
  }

  async enableVersioning(bucketName: string): Promise<void> {
    await callProvider(`enable versioning on ${bucketName}`, () =>
      this.client.send(new PutBucketVersioningCommand({
        Bucket: bucketName,
        VersioningConfiguration: { Status: 'Enabled' }
      }))
    );
  }

  async allowPublicAccess(bucketName: string): Promise<void> {
    await callProvider(`configure public access block on ${bucketName}`, () =>
      this.client.send(new PutPublicAccessBlockCommand({
        Bucket: bucketName,
        PublicAccessBlockConfiguration: {
          BlockPublicAcls: false,
          IgnorePublicAcls: false,
          BlockPublicPolicy: false,
          RestrictPublicBuckets: false
        }
      }))
    );
  }

  async uploadFile(bucketName: string, key: string, filePath: string): Promise<UploadResult> {
    return callProvider(`upload ${filePath} to s3://${bucketName}/${key}`, async () => {
      const result = await this.client.send(new PutObjectCommand({
        Bucket: bucketName,
        Key: key,
        Body: readFileSync(filePath),
        ContentType: this.getContentType(filePath)
      }));

      return {
        key,
        etag: result.ETag || '',
        url: objectUrl(bucketName, this.region, key)
      };
    });
  }

  async countObjects(bucketName: string): Promise<number> {
    return callProvider(`list objects in ${bucketName}`, async () => {
      let count = 0;
      let token: string | undefined;
      do {
        const page = await this.client.send(new ListObjectsV2Command({
          Bucket: bucketName,
          ContinuationToken: token
        }));
        count += page.KeyCount ?? page.Contents?.length ?? 0;
        token = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (token);
      return count;
    });
  }

  async emptyBucket(bucketName: string): Promise<number> {
    return callProvider(`empty S3 bucket ${bucketName}`, async () => {
      let removed = 0;
      let keyMarker: string | undefined;
      let versionIdMarker: string | undefined;

      do {
        const page = await this.client.send(new ListObjectVersionsCommand({
          Bucket: bucketName,
          KeyMarker: keyMarker,
          VersionIdMarker: versionIdMarker
        }));

        const objects: ObjectIdentifier[] = [...(page.Versions ?? []), ...(page.DeleteMarkers ?? [])]
          .flatMap(entry => entry.Key ? [{ Key: entry.Key, VersionId: entry.VersionId }] : []);

        if (objects.length > 0) {
          const result = await this.client.send(new DeleteObjectsCommand({
            Bucket: bucketName,
            Delete: { Objects: objects, Quiet: true }
          }));
          const failed = result.Errors ?? [];
          if (failed.length > 0) {
            const keys = failed.map(entry => `${entry.Key ?? '?'} (${entry.Code ?? 'unknown'})`).join(', ');
            throw new Error(`${failed.length} object version(s) could not be deleted after removing ${removed + objects.length - failed.length}: ${keys}`);
          }
          removed += objects.length;
        }

        keyMarker = page.IsTruncated ? page.NextKeyMarker : undefined;
        versionIdMarker = page.IsTruncated ? page.NextVersionIdMarker : undefined;
      } while (keyMarker);

      return removed;
    });
  }

  async deleteBucket(bucketName: string): Promise<void> {
    await callProvider(`delete S3 bucket ${bucketName}`, () =>
      this.client.send(new DeleteBucketCommand({ Bucket: bucketName }))
    );
  }

  private getContentType(filePath: string): string {
    const ext = filePath.split('.').pop()?.toLowerCase();

    const contentTypes: { [key: string]: string } = {
      'html': 'text/html',
      'txt': 'text/plain',
      'json': 'application/json',
      'sh': 'text/x-shellscript'
    };

    return contentTypes[ext || ''] || 'application/octet-stream';
  }
}
