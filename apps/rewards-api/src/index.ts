import process from 'node:process';
import { createApp } from './bootstrap/app.js';
import { runRewardsService } from './bootstrap/lifecycle.js';

void runRewardsService(createApp(), process);
