import { AppConfig, loadConfig } from '../config/appConfig';
import { ResendEmailService } from '../services/email/ResendEmailService';
import { FulfillmentService } from '../services/FulfillmentService';
import { OpenAILyricsGenerator } from '../services/lyrics/OpenAILyricsGenerator';
import { KlaviyoService } from '../services/marketing/KlaviyoService';
import { MurekaClient } from '../services/music/MurekaClient';
import { PaymentService } from '../services/payments/PaymentService';
import { ShareManager } from '../services/ShareManager';
import { SongService } from '../services/SongService';
import { FileShareStorage } from '../storage/FileShareStorage';
import type { AppServices } from '../app';

export class ServiceContainer {
  private static instance: ServiceContainer | null = null;

  static initialize(config: AppConfig = loadConfig()): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer(config);
    }
    return ServiceContainer.instance;
  }

  private readonly config: AppConfig;
  private readonly songService: SongService;
  private readonly paymentService: PaymentService;
  private readonly shareManager: ShareManager;
  private readonly mailingList: KlaviyoService;
  private readonly fulfillmentService: FulfillmentService;

  private constructor(config: AppConfig) {
    this.config = config;
    this.shareManager = new ShareManager(new FileShareStorage(config.shares.storagePath), config.shares);
    this.songService = new SongService(new OpenAILyricsGenerator(config.openai), new MurekaClient(config.mureka));
    this.paymentService = new PaymentService(config.stripe, config.site);
    this.mailingList = new KlaviyoService(config.klaviyo);
    this.fulfillmentService = new FulfillmentService(
      this.songService,
      this.shareManager,
      new ResendEmailService(config.email),
      this.mailingList,
      config.site,
    );
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getAppServices(): AppServices {
    return {
      site: this.config.site,
      songService: this.songService,
      paymentService: this.paymentService,
      shareManager: this.shareManager,
      mailingList: this.mailingList,
      fulfillmentService: this.fulfillmentService,
    };
  }
}
