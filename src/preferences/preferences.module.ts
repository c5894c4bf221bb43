// src/preferences/preferences.module.ts
import { Module } from '@nestjs/common';
import { PreferenceResolverService } from './preference-resolver.service';

@Module({
  providers: [PreferenceResolverService],
  exports: [PreferenceResolverService],
})
export class PreferencesModule {}
